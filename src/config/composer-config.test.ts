import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { TRANSITION_PRESETS } from '../types/timeline.types';
import { ConfigError } from '../utils/errors';
import {
  defaultComposerConfig,
  loadComposerConfig,
  parseComposerConfig,
  resolvePlatformPreset,
  resolveTransitionStyle,
} from './composer-config';

describe('parseComposerConfig', () => {
  it('should fill every default from an empty document', () => {
    const config = defaultComposerConfig();

    expect(config.captions.maxWordsPerCue).toBe(3);
    expect(config.captions.highlightMode).toBe('word');
    expect(config.captions.minCueDurationMs).toBe(200);
    expect(config.captions.colors).toEqual({ text: '#FFFFFF', highlight: '#FFD700', outline: '#000000' });
    expect(config.broll.transition).toEqual({ durationSeconds: 0.5, audioCrossfade: true });
    expect(config.broll.shortClipPolicy).toBe('loop');
    expect(config.broll.fallback).toEqual({ policy: 'skip', strict: false });
    expect(config.broll.pip).toEqual({ scale: 0.4, corner: 'top-right', margin: 40 });
    expect(config.export.defaultPlatforms).toEqual(['tiktok']);
  });

  it('should keep provided values', () => {
    const config = parseComposerConfig({
      brand: { name: 'Acme' },
      captions: { maxWordsPerCue: 2, highlightMode: 'none', font: { family: 'Inter' } },
      broll: { shortClipPolicy: 'freeze', transition: { preset: 'wipe', durationSeconds: 0.3 } },
    });

    expect(config.brand).toEqual({ name: 'Acme' });
    expect(config.captions.maxWordsPerCue).toBe(2);
    expect(config.captions.font).toEqual({ family: 'Inter', size: 72, bold: true });
    expect(config.broll.shortClipPolicy).toBe('freeze');
    expect(config.broll.transition).toEqual({ preset: 'wipe', durationSeconds: 0.3, audioCrossfade: true });
  });

  it('should reject an unknown transition effect with its path', () => {
    try {
      parseComposerConfig({ broll: { transition: { effects: ['fade', 'sparkle'] } } });
      expect.unreachable('parse should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^broll\.transition\.effects\.1: Invalid enum value\..*received 'sparkle'$/);
      }
    }
  });

  it('should reject bad colours and word counts', () => {
    try {
      parseComposerConfig({ captions: { maxWordsPerCue: 0, colors: { text: 'white' } } });
      expect.unreachable('parse should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toContain('captions.colors.text: Expected a #RRGGBB colour');
        expect(err.issues.some((i) => i.startsWith('captions.maxWordsPerCue:'))).toBe(true);
      }
    }
  });

  it('should require a default clip path for the default-clip policy', () => {
    expect(() => parseComposerConfig({ broll: { fallback: { policy: 'default-clip' } } })).toThrow(
      'Invalid composer config: broll.fallback.defaultClipPath: defaultClipPath is required when policy is "default-clip"'
    );
  });
});

describe('resolveTransitionStyle', () => {
  it('should default to the varied preset', () => {
    expect(resolveTransitionStyle(defaultComposerConfig().broll.transition)).toEqual({
      effects: TRANSITION_PRESETS.varied,
      durationSeconds: 0.5,
      audioCrossfade: true,
    });
  });

  it('should use the named preset', () => {
    const config = parseComposerConfig({ broll: { transition: { preset: 'smooth' } } });

    expect(resolveTransitionStyle(config.broll.transition).effects).toEqual(['fade', 'dissolve', 'fadeblack', 'fadewhite']);
  });

  it('should prefer explicit effects over the preset', () => {
    const config = parseComposerConfig({ broll: { transition: { preset: 'smooth', effects: ['radial'] } } });

    expect(resolveTransitionStyle(config.broll.transition).effects).toEqual(['radial']);
  });
});

describe('resolvePlatformPreset', () => {
  it('should apply overrides on top of the preset', () => {
    const config = parseComposerConfig({ export: { platforms: { tiktok: { fps: 60, videoBitrate: '8000k' } } } });

    expect(resolvePlatformPreset(config, 'tiktok')).toEqual({
      width: 1080,
      height: 1920,
      fps: 60,
      videoBitrate: '8000k',
      audioBitrate: '192k',
      maxDurationSeconds: 60,
      maxSizeMb: 287,
    });
    expect(resolvePlatformPreset(config, 'instagram_reels').maxDurationSeconds).toBe(90);
  });
});

describe('loadComposerConfig', () => {
  it('should load and validate a JSON file', async () => {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'composer-config-'));
    const file = path.join(dir, 'brand.json');
    await fs.promises.writeFile(file, JSON.stringify({ brand: { name: 'Acme' } }));

    const config = await loadComposerConfig(file);

    expect(config.brand.name).toBe('Acme');
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should report a missing file', async () => {
    await expect(loadComposerConfig('/nonexistent/brand.json')).rejects.toThrow(
      'Config file not found: /nonexistent/brand.json'
    );
  });

  it('should report invalid JSON', async () => {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'composer-config-'));
    const file = path.join(dir, 'broken.json');
    await fs.promises.writeFile(file, '{ "brand": ');

    await expect(loadComposerConfig(file)).rejects.toBeInstanceOf(ConfigError);
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should accept the example config shipped in config/', async () => {
    const config = await loadComposerConfig(path.resolve(__dirname, '../../config/brand.example.json'));

    expect(config.brand.name).toBe('Acme Coffee');
    expect(config.export.defaultPlatforms).toEqual(['tiktok', 'instagram_reels']);
    expect(config.batch).toEqual({ concurrency: 2, jobTimeoutSeconds: 900 });
  });
});

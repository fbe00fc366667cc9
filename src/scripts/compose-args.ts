import { isPlatformId, PLATFORM_IDS, type PlatformId } from '../services/render/platform-presets';
import type { CompositionJobSpec } from '../types/job.types';

export const USAGE = `Usage:
  compose --video <avatar.mp4> --words <words.json> --output <dir>
          [--config <brand.json>] [--broll <broll_plan.csv>]
          [--platform <id>[,<id>...]] [--duration <seconds>] [--strict] [--enqueue]
  compose --batch <manifest.json> [--strict]
  compose --list-cache | --clear-cache

Platforms: ${PLATFORM_IDS.join(', ')}
Exit codes: 0 success, 1 failure, 2 usage error`;

/** Bad command line. Exit code 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type ComposeCommand =
  | { kind: 'help' }
  | { kind: 'list-cache' }
  | { kind: 'clear-cache' }
  | { kind: 'run'; spec: CompositionJobSpec; enqueue: boolean }
  | { kind: 'batch'; manifestPath: string; strict: boolean };

const VALUE_FLAGS = ['video', 'words', 'config', 'output', 'broll', 'platform', 'duration', 'batch'] as const;
const BOOLEAN_FLAGS = ['strict', 'list-cache', 'clear-cache', 'enqueue', 'help'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];
type BooleanFlag = (typeof BOOLEAN_FLAGS)[number];

const isValueFlag = (name: string): name is ValueFlag => VALUE_FLAGS.some((f) => f === name);
const isBooleanFlag = (name: string): name is BooleanFlag => BOOLEAN_FLAGS.some((f) => f === name);

interface RawArgs {
  values: Map<ValueFlag, string[]>;
  switches: Set<BooleanFlag>;
}

function tokenize(argv: readonly string[]): RawArgs {
  const values = new Map<ValueFlag, string[]>();
  const switches = new Set<BooleanFlag>();

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (!token.startsWith('--')) {
      throw new UsageError(`Unexpected argument: ${token}`);
    }

    const eq = token.indexOf('=');
    const name = token.slice(2, eq === -1 ? undefined : eq);

    if (isBooleanFlag(name)) {
      if (eq !== -1) throw new UsageError(`Option --${name} takes no value`);
      switches.add(name);
      continue;
    }
    if (!isValueFlag(name)) {
      throw new UsageError(`Unknown option: --${name}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = token.slice(eq + 1);
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
      value = argv[++i];
    }
    if (value === undefined || value === '') {
      throw new UsageError(`Option --${name} needs a value`);
    }
    values.set(name, [...(values.get(name) ?? []), value]);
  }

  return { values, switches };
}

function parsePlatforms(raw: readonly string[]): PlatformId[] {
  const ids = raw.flatMap((v) => v.split(',')).map((v) => v.trim()).filter((v) => v !== '');
  const platforms: PlatformId[] = [];
  for (const id of ids) {
    if (!isPlatformId(id)) {
      throw new UsageError(`Unknown platform "${id}" (expected one of: ${PLATFORM_IDS.join(', ')})`);
    }
    if (!platforms.includes(id)) platforms.push(id);
  }
  return platforms;
}

function parseDuration(raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new UsageError(`--duration must be a positive number of seconds, got "${raw}"`);
  }
  return value;
}

/** Turn argv (without node and script) into a command. */
export function parseComposeArgs(argv: readonly string[]): ComposeCommand {
  const { values, switches } = tokenize(argv);
  // The last occurrence of a single-valued option wins
  const single = (flag: ValueFlag): string | undefined => values.get(flag)?.at(-1);

  if (switches.has('help')) return { kind: 'help' };

  if (switches.has('list-cache') || switches.has('clear-cache')) {
    if (switches.has('list-cache') && switches.has('clear-cache')) {
      throw new UsageError('--list-cache and --clear-cache cannot be combined');
    }
    if (values.size > 0) {
      throw new UsageError('Cache maintenance takes no other options');
    }
    return { kind: switches.has('list-cache') ? 'list-cache' : 'clear-cache' };
  }

  const manifestPath = single('batch');
  if (manifestPath !== undefined) {
    const conflicting = VALUE_FLAGS.filter((f) => f !== 'batch' && values.has(f));
    if (conflicting.length > 0 || switches.has('enqueue')) {
      const names = [...conflicting, ...(switches.has('enqueue') ? ['enqueue'] : [])];
      throw new UsageError(`--batch cannot be combined with ${names.map((f) => `--${f}`).join(', ')}`);
    }
    return { kind: 'batch', manifestPath, strict: switches.has('strict') };
  }

  const missing = (['video', 'words', 'output'] as const).filter((f) => !values.has(f));
  if (missing.length > 0) {
    throw new UsageError(`Missing required option(s): ${missing.map((f) => `--${f}`).join(', ')}`);
  }

  const videoPath = single('video');
  const wordsPath = single('words');
  const outputDir = single('output');
  if (videoPath === undefined || wordsPath === undefined || outputDir === undefined) {
    throw new UsageError('Missing required option(s)');
  }

  const configPath = single('config');
  const brollPlanPath = single('broll');
  const duration = single('duration');
  const platforms = parsePlatforms(values.get('platform') ?? []);

  const spec: CompositionJobSpec = {
    videoPath,
    wordsPath,
    outputDir,
    ...(configPath !== undefined ? { configPath } : {}),
    ...(brollPlanPath !== undefined ? { brollPlanPath } : {}),
    ...(platforms.length > 0 ? { platforms } : {}),
    ...(duration !== undefined ? { totalDurationSeconds: parseDuration(duration) } : {}),
    ...(switches.has('strict') ? { strict: true } : {}),
  };

  return { kind: 'run', spec, enqueue: switches.has('enqueue') };
}

/**
 * Upgrade command - find newer versions of sbt dependencies and rewrite
 * the build files in place.
 *
 * ## Features
 *
 * - Reads `build.sbt`, `project/plugins.sbt` and `project/*.scala` (or the
 *   configured files)
 * - Resolves published versions from Maven Central (or a mirror) concurrently
 * - Interactive picker, or `--yes` to take every upgrade
 * - Package filtering with wildcards (`--package=dev.zio:*`)
 * - Dry-run mode to preview upgrades
 * - Only the selected version literals change; everything else in the file
 *   is left byte-for-byte intact
 *
 * ## Usage
 *
 * ```bash
 * # Pick upgrades interactively
 * sbt-upgrade
 *
 * # List available upgrades without writing anything
 * sbt-upgrade --dry-run
 *
 * # Apply every upgrade for ZIO artifacts
 * sbt-upgrade --yes --package 'dev.zio:*'
 * ```
 *
 * ## Exit codes
 *
 * - `0` nothing to do, nothing selected, dry run, or upgrades written
 * - `1` missing build file, unparseable build file, invalid configuration
 *   or a rewrite conflict
 * - `130` cancelled (Ctrl+C, `q` in the picker, or declining the write)
 *
 * @module
 */

import { AbortPromptError, ExitPromptError } from '@inquirer/core';
import { Command } from 'commander';
import { z } from 'zod';
import { CommandParams } from '../src/cli/CommandParams.ts';
import {
  loadUpgradeConfig,
  type UpgradeConfig,
  type UpgradeConfigLayer,
} from '../src/config/UpgradeConfig.ts';
import {
  BuildFileParser,
  BuildFileRewriter,
  coordinateKey,
  type Declaration,
  formatCoordinate,
  MavenCentralClient,
  ParseError,
  patternToRegex,
  type RegistryClient,
  RegistryResolver,
  ResolutionCancelledError,
  type ResolutionOutcome,
  type ResolutionReport,
  type UpdateCandidate,
  UpdateClassifier,
  VersionComparator,
} from '../src/deps/.exports.ts';
import type { CommandLog } from '../src/logging/CommandLog.ts';
import type { BuildFileStore } from '../src/services/BuildFileStore.ts';
import type { PromptService } from '../src/services/PromptService.ts';
import { TaskPipeline } from '../src/services/TaskPipeline.ts';

/** Exit code for a run the user cancelled. */
export const EXIT_CANCELLED = 130;

/**
 * Zod schema for upgrade command flags, as produced by commander.
 */
export const UpgradeFlagsSchema = z.object({
  cwd: z.string().optional().describe('Project directory (default: current directory)'),
  dryRun: z.boolean().optional().describe('List available upgrades without writing'),
  yes: z.boolean().optional().describe('Apply every upgrade without prompting'),
  package: z.string().optional().describe(
    'Only consider matching coordinates, supports wildcards (e.g., dev.zio:*)',
  ),
  preRelease: z.boolean().optional().describe('Include pre-release versions'),
  concurrency: z.coerce.number().int().min(1).max(64).optional().describe(
    'Registry lookups in flight at once',
  ),
  backup: z.boolean().optional().describe('Keep <file>.bak (disable with --no-backup)'),
  verbose: z.boolean().optional().describe('Show detailed upgrade information'),
});

export type UpgradeFlags = z.infer<typeof UpgradeFlagsSchema>;

/**
 * Typed parameter accessor for the upgrade command.
 */
export class UpgradeParams extends CommandParams<UpgradeFlags> {
  get Cwd(): string {
    return this.Flag('cwd') ?? process.cwd();
  }

  get DryRun(): boolean {
    return this.Flag('dryRun') ?? false;
  }

  get Yes(): boolean {
    return this.Flag('yes') ?? false;
  }

  get PackageFilter(): string | undefined {
    return this.Flag('package');
  }

  get Verbose(): boolean {
    return this.Flag('verbose') ?? false;
  }

  /**
   * Flag values that override configuration. Unset flags leave the
   * configured value alone.
   */
  get ConfigOverrides(): UpgradeConfigLayer {
    return {
      concurrency: this.Flag('concurrency'),
      includePreRelease: this.Flag('preRelease') ? true : undefined,
      backup: this.Flag('backup') === false ? false : undefined,
    };
  }
}

/**
 * Collaborators the command runs against.
 */
export interface UpgradeServices {
  Log: CommandLog;
  Files: BuildFileStore;
  Prompts: PromptService;

  /** Registry client for the run's configuration */
  Registry: (config: UpgradeConfig, scalaVersion?: string) => RegistryClient;

  /** Whether the picker can be shown (stdin and stdout are terminals) */
  Interactive: boolean;

  Env?: NodeJS.ProcessEnv;

  /** Aborted on Ctrl+C */
  Signal?: AbortSignal;
}

/**
 * One build file read for the run.
 */
interface BuildFile {
  path: string;
  text: string;
  declarations: Declaration[];
}

interface UpgradeContext {
  config: UpgradeConfig;
  files: BuildFile[];
  declarations: Declaration[];
  report: ResolutionReport;
  candidates: UpdateCandidate[];
}

const parser = new BuildFileParser();
const comparator = new VersionComparator();
const classifier = new UpdateClassifier(comparator);
const rewriter = new BuildFileRewriter();

/**
 * Run an upgrade end to end.
 *
 * @returns Process exit code
 */
export async function runUpgrade(
  Params: UpgradeParams,
  Services: UpgradeServices,
): Promise<number> {
  const { Log, Files, Prompts, Signal } = Services;

  try {
    const config = await loadUpgradeConfig(Files, {
      env: Services.Env,
      overrides: Params.ConfigOverrides,
    });

    const [required] = config.files;
    if (!(await Files.Exists(required))) {
      Log.Error(`No ${required} found in ${Params.Cwd}.`);
      return 1;
    }

    const ctx: UpgradeContext = {
      config,
      files: [],
      declarations: [],
      report: new Map(),
      candidates: [],
    };

    await TaskPipeline.Run(ctx, [
      {
        title: 'Reading build files',
        run: async (ctx, { UpdateTitle }) => {
          ctx.files = await readBuildFiles(Files, ctx.config.files, UpdateTitle);
          ctx.declarations = selectDeclarations(
            ctx.files.flatMap((file) => file.declarations),
            Params.PackageFilter,
            ctx.config.exclude,
          );

          UpdateTitle(
            `Found ${parser.uniqueCoordinates(ctx.declarations).length} dependencies in ${ctx.files.length} file(s)`,
          );
        },
      },
      {
        title: 'Resolving versions',
        skip: (ctx) => ctx.declarations.length === 0 ? 'nothing to resolve' : false,
        run: async (ctx, { UpdateTitle, Spinner, Signal }) => {
          const scalaVersion = parser.findScalaVersion(
            ctx.files.flatMap((file) => file.declarations),
          );
          const resolver = new RegistryResolver(
            Services.Registry(ctx.config, scalaVersion),
            {
              concurrency: ctx.config.concurrency,
              retries: ctx.config.retries,
              retryBackoffMs: ctx.config.retryBackoffMs,
              log: Log,
              onSettled: (outcome) => logOutcome(Log, outcome),
            },
          );

          const coordinates = parser.uniqueCoordinates(ctx.declarations);
          ctx.report = await resolver.resolveAll(coordinates, Signal);

          const failed = [...ctx.report.values()].filter((o) => o.status === 'failed').length;
          if (failed > 0) {
            Spinner.Warn(
              `Resolved ${coordinates.length - failed} of ${coordinates.length} dependencies (${failed} failed)`,
            );
          } else {
            UpdateTitle(`Resolved ${coordinates.length} dependencies`);
          }
        },
      },
      {
        title: 'Checking for upgrades',
        skip: (ctx) => ctx.report.size === 0,
        run: (ctx, { UpdateTitle }) => {
          ctx.candidates = classifyAll(
            ctx.declarations,
            ctx.report,
            ctx.config.includePreRelease,
          );
          UpdateTitle(`${ctx.candidates.length} upgrade(s) available`);
        },
      },
    ], Log, { signal: Signal });

    logFailures(Log, ctx.report);

    if (ctx.candidates.length === 0) {
      Log.Info('All dependencies are up to date.');
      return 0;
    }

    if (Params.DryRun || Params.Yes || !Services.Interactive) {
      logCandidates(Log, ctx.candidates);
    }

    if (Params.DryRun) {
      Log.Info(`[DRY RUN] ${ctx.candidates.length} upgrade(s) would be available to apply`);
      return 0;
    }

    let selection: UpdateCandidate[];

    if (Params.Yes) {
      selection = ctx.candidates;
    } else if (!Services.Interactive) {
      Log.Error(
        'Cannot prompt for a selection without a terminal. Pass --yes to apply every upgrade or --dry-run to list them.',
      );
      return 1;
    } else {
      const picked = await Prompts.SelectUpgrades(
        'Select upgrades to apply',
        ctx.candidates,
        { signal: Signal },
      );

      if (picked === undefined) {
        Log.Warn('Cancelled.');
        return EXIT_CANCELLED;
      }

      selection = picked;
    }

    if (selection.length === 0) {
      Log.Info('No upgrades selected.');
      return 0;
    }

    // Every file's edits are validated before anything is written.
    const rewrites = ctx.files
      .map((file) => ({
        path: file.path,
        text: rewriter.rewrite(file.text, file.declarations, selection),
        original: file.text,
      }))
      .filter((file) => file.text !== file.original);

    if (!Params.Yes) {
      const confirmed = await Prompts.Confirm(
        `Write ${selection.length} upgrade(s) to ${rewrites.map((f) => f.path).join(', ')}?`,
        { signal: Signal, default: true },
      );

      if (!confirmed) {
        Log.Warn('Cancelled.');
        return EXIT_CANCELLED;
      }
    }

    Signal?.throwIfAborted();

    for (const file of rewrites) {
      await Files.Write(file.path, file.text, { backup: ctx.config.backup });
      Log.Debug(`Wrote ${file.path}`);
    }

    Log.Success(
      `Applied ${selection.length} upgrade(s) to ${rewrites.map((f) => f.path).join(', ')}`,
    );

    return 0;
  } catch (error) {
    if (isCancellation(error, Signal)) {
      Log.Warn('Cancelled.');
      return EXIT_CANCELLED;
    }

    // ParseError, RewriteError and ConfigError all land here.
    Log.Error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

/**
 * Build the commander command for `sbt-upgrade`.
 *
 * @param createServices - Builds the run's services once flags are parsed
 * @param onExit - Receives the exit code
 */
export function createUpgradeCommand(
  createServices: (params: UpgradeParams) => UpgradeServices,
  onExit: (code: number) => void,
): Command {
  return new Command('upgrade')
    .description('Find newer versions of sbt dependencies and rewrite the build in place.')
    .option('--cwd <dir>', 'project directory (default: current directory)')
    .option('--dry-run', 'list available upgrades without writing')
    .option('-y, --yes', 'apply every upgrade without prompting')
    .option('-p, --package <pattern>', 'only consider matching coordinates (e.g. dev.zio:*)')
    .option('--pre-release', 'include pre-release versions')
    .option('-c, --concurrency <n>', 'registry lookups in flight at once')
    .option('--no-backup', 'do not keep <file>.bak')
    .option('--verbose', 'show detailed upgrade information')
    .action(async (options: unknown) => {
      const flags = UpgradeFlagsSchema.safeParse(options);
      if (!flags.success) {
        const services = createServices(new UpgradeParams({}));
        services.Log.Error(`Invalid options: ${z.prettifyError(flags.error)}`);
        onExit(1);
        return;
      }

      const params = new UpgradeParams(flags.data);
      onExit(await runUpgrade(params, createServices(params)));
    });
}

/**
 * Default registry client: Maven Central or the configured mirror.
 */
export function createRegistryClient(
  config: UpgradeConfig,
  scalaVersion?: string,
): RegistryClient {
  return new MavenCentralClient({
    baseUrl: config.registryUrl,
    timeoutMs: config.timeoutMs,
    scalaVersion,
  });
}

async function readBuildFiles(
  files: BuildFileStore,
  entries: string[],
  updateTitle: (title: string) => void,
): Promise<BuildFile[]> {
  const result: BuildFile[] = [];
  const read = new Set<string>();

  for (const [index, entry] of entries.entries()) {
    for (const path of await expandEntry(files, entry)) {
      // Only the first configured file is required.
      if (read.has(path) || (index > 0 && !(await files.Exists(path)))) continue;
      read.add(path);

      updateTitle(`Reading ${path}`);
      const text = await files.Read(path);

      try {
        result.push({ path, text, declarations: parser.parse(text) });
      } catch (error) {
        if (error instanceof ParseError) {
          throw new ParseError(`${path}: ${error.reason}`, error.offset, text);
        }
        throw error;
      }
    }
  }

  return result;
}

/**
 * Expand a `dir/*.scala` style entry against the files in `dir`. Entries
 * without `*` are returned as they are.
 */
async function expandEntry(files: BuildFileStore, entry: string): Promise<string[]> {
  if (!entry.includes('*')) return [entry];

  const slash = entry.lastIndexOf('/');
  const dir = slash < 0 ? '.' : entry.slice(0, slash);
  const name = patternToRegex(entry.slice(slash + 1));

  const names = await files.List(dir);
  return names
    .filter((n) => name.test(n))
    .map((n) => (slash < 0 ? n : `${dir}/${n}`));
}

/**
 * Apply the `--package` filter and configured exclusions.
 */
function selectDeclarations(
  declarations: Declaration[],
  pattern: string | undefined,
  exclude: string[],
): Declaration[] {
  const included = pattern ? parser.filterByPattern(declarations, pattern) : declarations;
  if (exclude.length === 0) return included;

  const excluded = new Set(
    exclude.flatMap((p) => parser.filterByPattern(included, p)),
  );

  return included.filter((decl) => !excluded.has(decl));
}

/**
 * One candidate per coordinate, in extraction order. A coordinate declared
 * more than once is classified from its greatest declared version.
 */
function classifyAll(
  declarations: Declaration[],
  report: ResolutionReport,
  includePreRelease: boolean,
): UpdateCandidate[] {
  const declared = new Map<string, string[]>();
  for (const decl of declarations) {
    const key = coordinateKey(decl.coordinate);
    declared.set(key, [...(declared.get(key) ?? []), decl.version]);
  }

  const candidates: UpdateCandidate[] = [];

  for (const [key, versions] of declared) {
    const outcome = report.get(key);
    const current = comparator.max(versions);
    if (outcome?.status !== 'resolved' || current === undefined) continue;

    const candidate = classifier.classify(current, outcome.versionSet, {
      includePreRelease,
    });
    if (candidate) candidates.push(candidate);
  }

  return candidates;
}

function logOutcome(log: CommandLog, outcome: ResolutionOutcome): void {
  if (outcome.status === 'resolved') {
    log.Debug(
      `  ${formatCoordinate(outcome.versionSet.coordinate)}: ${outcome.versionSet.versions.length} version(s)`,
    );
  } else {
    log.Debug(`  ${formatCoordinate(outcome.coordinate)}: ${outcome.error.message}`);
  }
}

function logFailures(log: CommandLog, report: ResolutionReport): void {
  const failures = [...report.values()].flatMap((o) => o.status === 'failed' ? [o] : []);
  if (failures.length === 0) return;

  log.Warn(`Could not resolve ${failures.length} dependency(ies):`);
  for (const failure of failures) {
    log.Warn(`  ${formatCoordinate(failure.coordinate)} (${failure.error.kind})`);
  }
}

function logCandidates(log: CommandLog, candidates: UpdateCandidate[]): void {
  for (const candidate of candidates) {
    log.Info(
      `  ${formatCoordinate(candidate.coordinate)}: ${candidate.current} → ${candidate.proposed} (${candidate.rank})`,
    );
  }
}

function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  return (
    error instanceof ResolutionCancelledError ||
    error instanceof ExitPromptError ||
    error instanceof AbortPromptError ||
    signal?.aborted === true
  );
}

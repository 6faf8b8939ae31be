import { parseArgs } from '../command/parser.js';
import { loadConfig, readEnv, resolveSettings } from '../config/loader.js';
import { Dispatcher } from '../dispatch/dispatcher.js';
import type { ProcessRunner } from '../dispatch/types.js';
import { CoachError, isCoachError } from '../shared/errors.js';
import { ExecaRunner } from '../shared/exec.js';
import type { ExecaRunnerOptions } from '../shared/exec.js';
import { enableVerbose, logger } from '../shared/logger.js';
import { announce, launchNotice, present } from './present.js';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliDeps {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  createRunner?: (options: ExecaRunnerOptions) => ProcessRunner;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function writeLines(write: (text: string) => void, lines: readonly string[]): void {
  for (const line of lines) {
    write(line.endsWith('\n') ? line : `${line}\n`);
  }
}

function reportError(io: CliIO, err: CoachError): number {
  writeLines(io.stderr, [`error: ${err.message}`]);
  const help = err.context?.['help'];
  if (typeof help === 'string' && help !== '') {
    io.stderr(help);
  }
  return err.exitCode;
}

/**
 * Run one CLI invocation and return the process exit status.
 * Never throws: every failure becomes a printed diagnostic plus a non-zero status.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? processIO;
  const createRunner = deps.createRunner ?? ((options) => new ExecaRunner(options));

  try {
    const parsed = parseArgs(argv);
    if (parsed.type === 'info') {
      io.stdout(parsed.text);
      return 0;
    }

    const { command, flags } = parsed;
    if (flags.verbose) enableVerbose();

    const env = readEnv(deps.env ?? process.env);
    const { config, configPath, fromFile } = loadConfig(flags.configPath ?? env.GARMIN_COACH_CONFIG);
    const settings = resolveSettings(config, env, flags);
    logger.debug({ configPath, fromFile, settings }, 'Settings resolved');

    const dispatcher = new Dispatcher({
      operations: settings.operations,
      runner: createRunner({ timeoutMs: settings.timeoutMs }),
      passKind: settings.passKind,
      cwd: settings.workingDirectory,
    });

    writeLines(io.stdout, [announce(command), ...launchNotice(command)]);
    const result = await dispatcher.dispatch(command);
    const presentation = present(command, result);
    writeLines(io.stdout, presentation.stdout);
    writeLines(io.stderr, presentation.stderr);
    return presentation.exitCode;
  } catch (err) {
    if (isCoachError(err)) {
      logger.debug({ code: err.code, context: err.context }, err.message);
      return reportError(io, err);
    }
    logger.error({ err }, 'Unexpected error');
    writeLines(io.stderr, [`error: ${err instanceof Error ? err.message : String(err)}`]);
    return 1;
  }
}

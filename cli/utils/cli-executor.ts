import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface CLIExecutionOptions {
  timeout?: number; // milliseconds, 0 disables
  cwd?: string;
  env?: Record<string, string>;
  maxBuffer?: number; // bytes
}

export interface CLIExecutionResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  executionTime: number; // milliseconds
}

export class CLIExecutionError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly stdout: string,
    public readonly stderr: string,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = 'CLIExecutionError';
  }

  get notFound(): boolean {
    return this.exitCode === 127;
  }
}

interface ExecFailure {
  code?: number | string;
  killed?: boolean;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
  message?: string;
}

function asExecFailure(error: unknown): ExecFailure {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }
  const read = (key: string): unknown => Reflect.get(error, key);
  const code = read('code');
  const signal = read('signal');
  const stdout = read('stdout');
  const stderr = read('stderr');
  const message = read('message');
  return {
    code: typeof code === 'number' || typeof code === 'string' ? code : undefined,
    killed: read('killed') === true,
    signal: typeof signal === 'string' ? signal : null,
    stdout: typeof stdout === 'string' ? stdout : undefined,
    stderr: typeof stderr === 'string' ? stderr : undefined,
    message: typeof message === 'string' ? message : undefined,
  };
}

/**
 * Runs external binaries (whisper, yt-dlp) with an argument vector, no shell.
 */
export class CLIExecutor {
  /**
   * @throws CLIExecutionError if the binary is missing, times out or exits non-zero
   */
  static async execute(
    binary: string,
    args: string[] = [],
    options: CLIExecutionOptions = {}
  ): Promise<CLIExecutionResult> {
    const startTime = Date.now();
    const command = [binary, ...args].join(' ');

    const {
      timeout = 0,
      cwd = process.cwd(),
      env = {},
      maxBuffer = 64 * 1024 * 1024,
    } = options;

    try {
      const { stdout, stderr } = await execFileAsync(binary, args, {
        timeout,
        cwd,
        env: { ...process.env, ...env },
        maxBuffer,
        encoding: 'utf8',
      });

      return {
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        exitCode: 0,
        executionTime: Date.now() - startTime,
      };
    } catch (error: unknown) {
      const failure = asExecFailure(error);
      const stdout = failure.stdout ?? '';
      const stderr = failure.stderr ?? '';

      if (failure.killed && failure.signal === 'SIGTERM') {
        throw new CLIExecutionError(`Command timed out after ${timeout}ms`, command, stdout, stderr, -1);
      }

      if (failure.code === 'ENOENT' || failure.code === 127) {
        throw new CLIExecutionError(`Command not found: ${binary}`, command, stdout, stderr, 127);
      }

      const exitCode = typeof failure.code === 'number' ? failure.code : 1;
      throw new CLIExecutionError(
        `Command failed with exit code ${exitCode}: ${failure.message ?? 'unknown error'}`,
        command,
        stdout,
        stderr,
        exitCode
      );
    }
  }
}

export type ProcessRunOptions = {
  timeoutMs: number;
  /** Environment variables removed from the inherited environment. */
  unsetEnv?: string[];
  /** Written to the child's stdin; stdin is closed immediately when absent. */
  input?: string;
};

export type ProcessResult =
  | {
      status: 'exited';
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      stdout: string;
      stderr: string;
    }
  | {
      status: 'timed-out';
      stdout: string;
      stderr: string;
    }
  | {
      status: 'spawn-failed';
      errorCode: string | undefined;
      message: string;
    };

export interface ProcessRunnerPort {
  /**
   * Run a command to completion. Never rejects for the child's own failures;
   * those are reported through the result.
   */
  run(command: string, args: string[], options: ProcessRunOptions): Promise<ProcessResult>;
}

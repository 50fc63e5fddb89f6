import { spawn } from 'child_process';

import type { ProcessResult, ProcessRunOptions, ProcessRunnerPort } from '../application/ports/process-runner.port';
import { getLogger } from '../utils/get-logger';

const KILL_GRACE_MS = 2000;

export class ProcessRunner implements ProcessRunnerPort {
  private readonly logger = getLogger();

  public run(command: string, args: string[], options: ProcessRunOptions): Promise<ProcessResult> {
    return new Promise((resolve) => {
      const env = { ...process.env };
      for (const name of options.unsetEnv ?? []) {
        delete env[name];
      }

      // Own process group, so a timeout can take down grandchildren too
      const child = spawn(command, args, {
        env,
        detached: process.platform !== 'win32',
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let settled = false;

      const finish = (result: ProcessResult) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeoutTimer);
        resolve(result);
      };

      const killGroup = (signal: NodeJS.Signals) => {
        if (child.pid === undefined) {
          return;
        }
        try {
          if (process.platform === 'win32') {
            child.kill(signal);
          } else {
            process.kill(-child.pid, signal);
          }
        } catch (error) {
          // ESRCH: the group is already gone
          this.logger.debug(
            `Could not signal process group: pid=${child.pid}, signal=${signal}, error=${String(error)}`,
          );
        }
      };

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        this.logger.debug(`Process timed out, terminating: command=${command}, pid=${child.pid ?? 'unknown'}`);
        killGroup('SIGTERM');
        // Not cancelled when the child closes: group members that ignore
        // SIGTERM can outlive it
        setTimeout(() => killGroup('SIGKILL'), KILL_GRACE_MS);
      }, options.timeoutMs);

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error: NodeJS.ErrnoException) => {
        finish({ status: 'spawn-failed', errorCode: error.code, message: error.message });
      });

      child.on('close', (exitCode, signal) => {
        const output = {
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
        };
        if (timedOut) {
          finish({ status: 'timed-out', ...output });
          return;
        }
        finish({ status: 'exited', exitCode, signal, ...output });
      });

      // A child that exits without reading its input must not crash the run
      child.stdin.on('error', (error) => {
        this.logger.debug(`Child stdin closed early: command=${command}, error=${error.message}`);
      });
      child.stdin.end(options.input ?? '');
    });
  }
}

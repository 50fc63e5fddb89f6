#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import path from 'node:path';

import { confirm } from '@inquirer/prompts';

import type { ReportSinkPort } from './application/ports/report-sink.port';
import { AuditPipeline } from './application/services/audit-pipeline';
import { AuditorInvoker } from './application/services/auditor-invoker';
import { MailDispatcher } from './application/services/mail-dispatcher';
import { TargetResolver } from './application/services/target-resolver';
import type { AppConfig } from './config/config-schema';
import { loadConfig, resolveConfigPath } from './config/load-config';
import { EXIT_CODE, errorMessage, exitCodeFor } from './domain/errors';
import { targetLabel } from './domain/target';
import { CommandReportSink } from './infrastructure/command-report-sink';
import { FileReportSink } from './infrastructure/file-report-sink';
import { JsonStateStore } from './infrastructure/json-state-store';
import { NodeFileSystem } from './infrastructure/node-file-system';
import { ProcessRunner } from './infrastructure/process-runner';
import { SmtpMailTransport } from './infrastructure/smtp-mail-transport';
import { StdoutReportSink } from './infrastructure/stdout-report-sink';
import { getLogger } from './utils/get-logger';
import { formatDuration } from './utils/parse-duration';

type ParsedArgs = {
  command: string | null;
  configPath: string | null;
  yes: boolean;
  help: boolean;
  version: boolean;
  unknown: string[];
};

const logger = getLogger();

const main = async (): Promise<number> => {
  const args = parseArgs(process.argv.slice(2));

  if (args.version) {
    process.stdout.write(`periodic-audit version ${readVersion()}\n`);
    return EXIT_CODE.SUCCESS;
  }
  if (args.help || args.command === 'help') {
    printHelp();
    return EXIT_CODE.SUCCESS;
  }
  if (args.unknown.length > 0) {
    logger.error({ arguments: args.unknown }, 'Unknown arguments');
    printHelp();
    return EXIT_CODE.FAILURE;
  }

  const configPath = resolveConfigPath(args.configPath);
  const command = args.command ?? 'run';

  if (command === 'run') {
    return runAudit(await loadConfig(configPath));
  }
  if (command === 'check-config') {
    return checkConfig(configPath);
  }
  if (command === 'reset-state') {
    return resetState(await loadConfig(configPath), args.yes);
  }

  logger.error({ command }, 'Unknown command');
  printHelp();
  return EXIT_CODE.FAILURE;
};

const buildSinks = (config: AppConfig, fileSystem: NodeFileSystem, processRunner: ProcessRunner) => {
  const sinks: ReportSinkPort[] = [];
  let mailTransport: SmtpMailTransport | null = null;

  if (config.mail.disabled) {
    logger.info('Mail sending is disabled; not sending report e-mail');
  } else {
    mailTransport = new SmtpMailTransport(config.mail);
    sinks.push(new MailDispatcher(mailTransport, config.mail));
  }
  if (config.reportFile && !config.reportFile.disabled) {
    sinks.push(new FileReportSink(fileSystem, config.reportFile));
  }
  if (config.reportCommand && !config.reportCommand.disabled) {
    sinks.push(new CommandReportSink(processRunner, config.reportCommand));
  }
  if (sinks.length === 0) {
    sinks.push(new StdoutReportSink());
  }

  return { sinks, close: () => mailTransport?.close() };
};

const runAudit = async (config: AppConfig): Promise<number> => {
  const fileSystem = new NodeFileSystem();
  const processRunner = new ProcessRunner();
  const stateStore = new JsonStateStore(fileSystem, {
    stateFile: config.stateFile,
    lockFile: config.lockFile,
  });
  const { sinks, close } = buildSinks(config, fileSystem, processRunner);

  const pipeline = new AuditPipeline(
    new AuditorInvoker(processRunner, fileSystem, config.auditor),
    new TargetResolver(fileSystem),
    stateStore,
    sinks,
    {
      targets: config.targets,
      parallelism: config.auditor.parallelism,
      reportOnCleanRun: config.reportOnCleanRun,
      commitOnDeliveryFailure: config.commitOnDeliveryFailure,
      report: { recipients: config.mail.to, subject: config.mail.subject },
    },
  );

  try {
    const result = await pipeline.run();
    logger.info(
      {
        reported: result.report !== null,
        sinks: result.deliveries.map((delivery) => delivery.sink),
        committed: result.committed,
      },
      'Run complete',
    );
    return EXIT_CODE.SUCCESS;
  } finally {
    close();
  }
};

const checkConfig = async (configPath: string): Promise<number> => {
  const config = await loadConfig(configPath);
  const fileSystem = new NodeFileSystem();
  const auditorUsable = await fileSystem.isExecutable(config.auditor.path);

  const lines = [
    `Configuration '${configPath}' is valid.`,
    '',
    'Targets:',
    ...config.targets.map((target) => `  ${targetLabel(target)}`),
    '',
    `Auditor:     ${config.auditor.path}${auditorUsable ? '' : ' (NOT EXECUTABLE)'}`,
    `Timeout:     ${formatDuration(config.auditor.timeoutMs)}, parallelism ${config.auditor.parallelism}`,
    `State file:  ${config.stateFile}`,
    `Mail:        ${
      config.mail.disabled
        ? 'disabled'
        : `${config.mail.host}:${config.mail.port} -> ${config.mail.to.join(', ')} (${config.mail.retryAttempts} retries)`
    }`,
    `Clean runs:  ${config.reportOnCleanRun ? 'reported' : 'not reported'}`,
    `On delivery failure: ${config.commitOnDeliveryFailure ? 'commit state' : 'keep previous state'}`,
  ];
  process.stdout.write(`${lines.join('\n')}\n`);

  return auditorUsable ? EXIT_CODE.SUCCESS : EXIT_CODE.AUDITOR_UNAVAILABLE;
};

const resetState = async (config: AppConfig, assumeYes: boolean): Promise<number> => {
  if (!assumeYes) {
    if (!process.stdin.isTTY) {
      logger.error('Refusing to reset state without --yes when not running interactively');
      return EXIT_CODE.FAILURE;
    }
    const confirmed = await confirm({
      message: `Move '${config.stateFile}' aside? Every current finding will be reported as new on the next run.`,
      default: false,
    });
    if (!confirmed) {
      logger.info('State reset cancelled');
      return EXIT_CODE.SUCCESS;
    }
  }

  const stateStore = new JsonStateStore(new NodeFileSystem(), {
    stateFile: config.stateFile,
    lockFile: config.lockFile,
  });
  const lock = await stateStore.acquireLock();
  try {
    const backupPath = await stateStore.reset();
    if (!backupPath) {
      logger.info({ stateFile: config.stateFile }, 'No state file to reset');
    }
    return EXIT_CODE.SUCCESS;
  } finally {
    await lock.release();
  }
};

const parseArgs = (args: string[]): ParsedArgs => {
  const parsed: ParsedArgs = {
    command: null,
    configPath: null,
    yes: false,
    help: false,
    version: false,
    unknown: [],
  };

  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (!token) {
      index += 1;
      continue;
    }
    if (token === '--config' || token === '-c') {
      parsed.configPath = args[index + 1] ?? null;
      index += 2;
      continue;
    }
    if (token === '--yes' || token === '-y') {
      parsed.yes = true;
    } else if (token === '--help' || token === '-h') {
      parsed.help = true;
    } else if (token === '--version' || token === '-v') {
      parsed.version = true;
    } else if (!token.startsWith('-') && parsed.command === null) {
      parsed.command = token;
    } else {
      parsed.unknown.push(token);
    }
    index += 1;
  }

  return parsed;
};

const readVersion = (): string => {
  const packageJson: unknown = JSON.parse(readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return 'unknown';
};

const printHelp = () => {
  const message = `
periodic-audit

Audits binaries for known vulnerabilities and delivers a report.
Meant to be started by a scheduler (cron, systemd timer); every run is one pass.

Usage:
  periodic-audit [run|check-config|reset-state] [options]

Commands:
  run            Audit all targets, deliver the report, update state (default)
  check-config   Validate the configuration and print a summary
  reset-state    Move the state file aside so the next run starts fresh

Options:
  --config, -c <path>   Configuration file (default: $PERIODIC_AUDIT_CONFIG or /etc/periodic-audit.conf)
  --yes, -y             Do not ask for confirmation (reset-state)
  --version, -v         Show version information and exit
  --help, -h            Show this help

Exit status:
  0  run completed and report delivered (or clean run not reported)
  1  configuration or unexpected error
  2  auditor unavailable
  3  report delivery failed
  4  another run holds the state lock
  5  state file corrupt
`;

  process.stdout.write(message);
};

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error({ code: exitCodeFor(error) }, errorMessage(error));
    process.exitCode = exitCodeFor(error);
  });

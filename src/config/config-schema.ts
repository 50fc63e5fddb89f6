import { z } from 'zod';

import { MAX_DURATION_MS, formatDuration, parseDuration } from '../utils/parse-duration';

const durationSchema = z.union([z.string(), z.number()]).transform((value, context) => {
  const milliseconds = parseDuration(value);
  if (milliseconds === undefined) {
    context.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid duration "${value}" (expected e.g. "30s", "5m", "1h")`,
    });
    return z.NEVER;
  }
  if (milliseconds > MAX_DURATION_MS) {
    context.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Duration "${value}" is longer than the supported maximum of ${formatDuration(MAX_DURATION_MS)}`,
    });
    return z.NEVER;
  }
  return milliseconds;
});

const exitCodesSchema = z.array(z.number().int().min(0).max(255)).min(1);

const targetSchema = z
  .union([
    z.string().min(1),
    z.object({
      path: z.string().min(1),
      name: z.string().min(1).optional(),
    }),
  ])
  .transform((value) => (typeof value === 'string' ? { path: value } : value));

export const DEFAULT_NOT_AUDITABLE_PATTERNS = [
  'No dependency information found',
  'not built with cargo auditable',
];

const auditorSchema = z
  .object({
    path: z.string().min(1),
    db: z.string().min(1).optional(),
    deny_warnings: z.boolean().default(true),
    timeout: durationSchema.default('10m'),
    parallelism: z.number().int().min(1).default(1),
    clean_exit_codes: exitCodesSchema.default([0]),
    vulnerable_exit_codes: exitCodesSchema.default([1]),
    not_auditable_patterns: z.array(z.string().min(1)).default(DEFAULT_NOT_AUDITABLE_PATTERNS),
    tries: z.number().int().min(1).max(30).default(1),
    retry_delay: durationSchema.default('2s'),
  })
  .strict()
  .refine(
    (auditor) => !auditor.clean_exit_codes.some((code) => auditor.vulnerable_exit_codes.includes(code)),
    { message: 'clean_exit_codes and vulnerable_exit_codes must not overlap' },
  )
  .transform((auditor) => ({
    path: auditor.path,
    db: auditor.db,
    denyWarnings: auditor.deny_warnings,
    timeoutMs: auditor.timeout,
    parallelism: auditor.parallelism,
    cleanExitCodes: auditor.clean_exit_codes,
    vulnerableExitCodes: auditor.vulnerable_exit_codes,
    notAuditablePatterns: auditor.not_auditable_patterns,
    tries: auditor.tries,
    retryDelayMs: auditor.retry_delay,
  }));

const mailSchema = z
  .object({
    disabled: z.boolean().default(false),
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).default(587),
    use_tls: z.boolean().default(true),
    implicit_tls: z.boolean().optional(),
    username: z.string().min(1).optional(),
    password: z.string().optional(),
    password_file: z.string().min(1).optional(),
    from: z.string().min(1).optional(),
    to: z.array(z.string().email()).default([]),
    subject: z.string().min(1).default('Periodic audit report'),
    retry_attempts: z.number().int().min(0).default(3),
    retry_base_delay: durationSchema.default('5s'),
    retry_max_delay: durationSchema.default('5m'),
    timeout: durationSchema.default('60s'),
  })
  .strict()
  .superRefine((mail, context) => {
    if (mail.disabled) {
      return;
    }
    if (!mail.host) {
      context.addIssue({ code: z.ZodIssueCode.custom, path: ['host'], message: 'Required unless mail is disabled' });
    }
    if (!mail.from) {
      context.addIssue({ code: z.ZodIssueCode.custom, path: ['from'], message: 'Required unless mail is disabled' });
    }
    if (mail.to.length === 0) {
      context.addIssue({ code: z.ZodIssueCode.custom, path: ['to'], message: 'At least one recipient is required' });
    }
    if (mail.password !== undefined && mail.password_file !== undefined) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['password_file'],
        message: 'Set either password or password_file, not both',
      });
    }
  })
  .transform((mail) => ({
    disabled: mail.disabled,
    host: mail.host ?? 'localhost',
    port: mail.port,
    useTls: mail.use_tls,
    implicitTls: mail.implicit_tls ?? mail.port === 465,
    username: mail.username,
    password: mail.password,
    passwordFile: mail.password_file,
    from: mail.from ?? '',
    to: mail.to,
    subject: mail.subject,
    retryAttempts: mail.retry_attempts,
    retryBaseDelayMs: mail.retry_base_delay,
    retryMaxDelayMs: mail.retry_max_delay,
    timeoutMs: mail.timeout,
  }));

const reportFileSchema = z
  .object({
    path: z.string().min(1),
    append: z.boolean().default(false),
    disabled: z.boolean().default(false),
  })
  .strict();

const reportCommandSchema = z
  .object({
    path: z.string().min(1),
    args: z.array(z.string()).default([]),
    disabled: z.boolean().default(false),
    timeout: durationSchema.default('60s'),
  })
  .strict()
  .transform((command) => ({
    path: command.path,
    args: command.args,
    disabled: command.disabled,
    timeoutMs: command.timeout,
  }));

export const DEFAULT_STATE_FILE = '/var/lib/periodic-audit/state.json';

export const configSchema = z
  .object({
    targets: z.array(targetSchema).min(1),
    state_file: z.string().min(1).default(DEFAULT_STATE_FILE),
    lock_file: z.string().min(1).optional(),
    commit_on_delivery_failure: z.boolean({
      required_error: 'Must be set explicitly to true or false',
    }),
    report_on_clean_run: z.boolean().default(true),
    auditor: auditorSchema,
    mail: mailSchema,
    report_file: reportFileSchema.optional(),
    report_command: reportCommandSchema.optional(),
  })
  .strict()
  .transform((config) => ({
    targets: config.targets,
    stateFile: config.state_file,
    lockFile: config.lock_file ?? `${config.state_file}.lock`,
    commitOnDeliveryFailure: config.commit_on_delivery_failure,
    reportOnCleanRun: config.report_on_clean_run,
    auditor: config.auditor,
    mail: config.mail,
    reportFile: config.report_file,
    reportCommand: config.report_command,
  }));

export type AppConfig = z.output<typeof configSchema>;
export type AuditorConfig = AppConfig['auditor'];
export type MailConfig = AppConfig['mail'];
export type ReportFileConfig = NonNullable<AppConfig['reportFile']>;
export type ReportCommandConfig = NonNullable<AppConfig['reportCommand']>;

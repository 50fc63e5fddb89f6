import { FAILURE_KIND } from '../../domain/audit-outcome';
import type { AuditOutcome } from '../../domain/audit-outcome';
import { AuditorUnavailableError, DeliveryFailureError } from '../../domain/errors';
import type { DeliveryResult, Report } from '../../domain/report';
import { isCleanRun, summarizeSnapshot } from '../../domain/run-snapshot';
import type { RunSnapshot } from '../../domain/run-snapshot';
import type { Target } from '../../domain/target';
import { getLogger } from '../../utils/get-logger';
import { runWithConcurrency } from '../../utils/run-with-concurrency';
import type { ReportSinkPort } from '../ports/report-sink.port';
import type { StateStorePort } from '../ports/state-store.port';
import type { AuditorInvoker } from './auditor-invoker';
import { aggregate } from './result-aggregator';
import { composeReport } from './report-composer';
import type { ReportSettings } from './report-composer';
import type { TargetResolver } from './target-resolver';

export type PipelineSettings = {
  targets: readonly Target[];
  parallelism: number;
  reportOnCleanRun: boolean;
  commitOnDeliveryFailure: boolean;
  report: ReportSettings;
};

export type PipelineResult = {
  snapshot: RunSnapshot;
  /** Null when a clean run was not reported. */
  report: Report | null;
  deliveries: DeliveryResult[];
  committed: boolean;
};

export class AuditPipeline {
  private readonly logger = getLogger();

  public constructor(
    private readonly invoker: AuditorInvoker,
    private readonly targetResolver: TargetResolver,
    private readonly stateStore: StateStorePort,
    private readonly sinks: readonly ReportSinkPort[],
    private readonly settings: PipelineSettings,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * One complete run under the state lock. Rejects with a typed AuditRunError
   * for run-level failures; per-target failures end up in the report.
   */
  public async run(): Promise<PipelineResult> {
    const lock = await this.stateStore.acquireLock();
    try {
      return await this.runLocked();
    } finally {
      await lock.release();
    }
  }

  private async runLocked(): Promise<PipelineResult> {
    const startedAt = this.now();
    const history = await this.stateStore.load();

    if (!(await this.invoker.isAvailable())) {
      throw new AuditorUnavailableError('Auditor executable is missing or not executable; nothing was audited');
    }

    const targets = await this.targetResolver.resolve(this.settings.targets);
    this.logger.info(
      { targets: targets.length, parallelism: this.settings.parallelism },
      'Auditing targets',
    );

    const outcomes = await this.scanAll(targets);
    const unavailable = outcomes.find(
      (outcome) => outcome.status === 'failed' && outcome.failure.kind === FAILURE_KIND.AUDITOR_UNAVAILABLE,
    );
    if (unavailable?.status === 'failed') {
      throw new AuditorUnavailableError(unavailable.failure.detail);
    }

    const snapshot = aggregate(outcomes, history, startedAt);
    const totals = summarizeSnapshot(snapshot);
    this.logger.info(totals, 'Audit finished');

    if (isCleanRun(snapshot) && !this.settings.reportOnCleanRun) {
      this.logger.info('Clean run and report_on_clean_run is off; no report sent');
      await this.stateStore.commit(snapshot);
      return { snapshot, report: null, deliveries: [], committed: true };
    }

    const report = composeReport(snapshot, this.settings.report);
    const deliveries: DeliveryResult[] = [];
    for (const sink of this.sinks) {
      deliveries.push(await sink.deliver(report));
    }

    const failures = deliveries.filter(
      (delivery): delivery is Extract<DeliveryResult, { status: 'failed' }> => delivery.status === 'failed',
    );
    if (failures.length === 0) {
      await this.stateStore.commit(snapshot);
      return { snapshot, report, deliveries, committed: true };
    }

    for (const failure of failures) {
      this.logger.error(
        { sink: failure.sink, attempts: failure.attempts, permanent: failure.permanent },
        `Report delivery failed: ${failure.reason}`,
      );
    }

    if (this.settings.commitOnDeliveryFailure) {
      this.logger.warn('Committing state despite delivery failure (commit_on_delivery_failure = true)');
      await this.stateStore.commit(snapshot);
    } else {
      this.logger.warn('State not committed; findings stay new until a report is delivered');
    }

    const summary = failures.map((failure) => `${failure.sink}: ${failure.reason}`).join('; ');
    throw new DeliveryFailureError(`Report could not be delivered (${summary})`);
  }

  // Once the auditor turns out to be unusable, the remaining targets are not started.
  private async scanAll(targets: readonly Target[]): Promise<AuditOutcome[]> {
    let unavailable: AuditOutcome | null = null;

    const tasks = targets.map((target) => async (): Promise<AuditOutcome> => {
      if (unavailable?.status === 'failed') {
        return { status: 'failed', target, failure: unavailable.failure, attempts: 0 };
      }
      const outcome = await this.invoker.scan(target);
      if (outcome.status === 'failed' && outcome.failure.kind === FAILURE_KIND.AUDITOR_UNAVAILABLE) {
        unavailable = outcome;
      }
      return outcome;
    });

    return runWithConcurrency(tasks, this.settings.parallelism);
  }
}

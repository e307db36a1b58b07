/**
 * SuiteRunner: runs a registered suite as one sweep and keeps the stored
 * report current while it runs.
 */

import { HarnessConfig } from '../config';
import { describeThrown } from '../domain/errors';
import { LifecyclePublisher } from '../data-plane/publisher';
import { Scenario } from '../domain/scenario';
import { Orchestrator } from '../engine/orchestrator';
import { Logger, logger as rootLogger } from '../logger';
import { ScenarioReport, ScenarioReportRecord } from '../report/scenario-report';
import { Store } from '../storage/store';
import { SuiteDefinition, SuiteRegistry } from './registry';

export interface StartedSweep {
  /** The stored record as created, status `running`. */
  record: ScenarioReportRecord;
  /** Settles with the finished report; rejects only if storage fails. */
  completion: Promise<ScenarioReport>;
}

export class SuiteRunner {
  private readonly logger: Logger;

  constructor(
    private readonly registry: SuiteRegistry,
    private readonly store: Store,
    private readonly publisher: LifecyclePublisher,
    private readonly config: Pick<HarnessConfig, 'defaultTimeoutMs' | 'defaultPollIntervalMs' | 'eventHistoryLimit'>,
    logger?: Logger,
  ) {
    this.logger = logger ?? rootLogger.child({ module: 'suite-runner' });
  }

  /**
   * Create the report and start the sweep without waiting for it.
   * Rejects with a VALIDATION.NOT_FOUND HarnessError for unknown suites.
   */
  async start(suiteId: string): Promise<StartedSweep> {
    const suite = this.registry.get(suiteId);
    const scenarios = suite.scenarios();
    const report = new ScenarioReport({ suiteId: suite.id });
    const record = await this.store.reports.create(report.toRecord());

    const completion = this.execute(suite, scenarios, report);
    return { record, completion };
  }

  /** Run a suite to completion. */
  async run(suiteId: string): Promise<ScenarioReport> {
    const started = await this.start(suiteId);
    return started.completion;
  }

  private async execute(
    suite: SuiteDefinition,
    scenarios: readonly Scenario[],
    report: ScenarioReport,
  ): Promise<ScenarioReport> {
    const suiteId = suite.id;
    const { collaborator, dispose } = suite.createCollaborator();
    const orchestrator = new Orchestrator(collaborator, {
      defaultTimeoutMs: this.config.defaultTimeoutMs,
      defaultPollIntervalMs: this.config.defaultPollIntervalMs,
      eventHistoryLimit: this.config.eventHistoryLimit,
      publisher: this.publisher,
      logger: this.logger.child({ suiteId }),
    });

    try {
      await orchestrator.runSweep(scenarios, {
        report,
        onResult: async (_result, current) => {
          await this.store.reports.update(current.id, current.toRecord());
        },
      });
    } catch (err) {
      this.logger.error('Sweep aborted', { suiteId, reportId: report.id, scenarioCount: scenarios.length, error: describeThrown(err) });
      report.complete();
    } finally {
      dispose();
    }

    await this.storeFinal(report);
    return report;
  }

  /** Write the completed report; on failure, retry without error details. */
  private async storeFinal(report: ScenarioReport): Promise<void> {
    const record = report.toRecord();
    try {
      await this.store.reports.update(report.id, record);
    } catch (err) {
      this.logger.error('Storing report failed; storing it without error details', {
        reportId: report.id,
        error: describeThrown(err),
      });
      await this.store.reports.update(report.id, withoutErrorDetails(record));
    }
  }
}

function withoutErrorDetails(record: ScenarioReportRecord): ScenarioReportRecord {
  return {
    ...record,
    results: record.results.map((result) =>
      result.error ? { ...result, error: { ...result.error, details: undefined } } : result,
    ),
  };
}

/**
 * Analysis Runner
 *
 * Calls the analysis engine and decides whether its answer still applies.
 * A result is applied only if, when it arrives, the monitoring session, the
 * observed element and the request itself are all still the latest.
 */

import type { AnalysisEngine, Finding, MonitoringContext } from '../host/host.types.js';
import { AnalysisError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('AnalysisRunner');

export interface AnalysisTarget {
  epoch: number;
  elementId: string | null;
}

interface AnalysisTicket extends AnalysisTarget {
  sequence: number;
}

export class AnalysisRunner {
  private sequence = 0;

  constructor(
    private readonly engine: AnalysisEngine,
    private readonly currentTarget: () => AnalysisTarget
  ) {}

  /**
   * Analyze text for context.
   *
   * @returns findings, or null when the engine failed or the result is stale
   */
  async run(text: string, context: MonitoringContext): Promise<Finding[] | null> {
    const ticket: AnalysisTicket = { ...this.currentTarget(), sequence: ++this.sequence };

    let findings: Finding[];
    try {
      findings = await this.engine.analyze(text, context);
    } catch (error) {
      const failure = new AnalysisError(
        'Analysis engine failed',
        { applicationId: context.applicationId, textLength: text.length },
        error instanceof Error ? error : undefined
      );
      logger.error(failure.message, failure, failure.toStructured());
      return null;
    }

    const staleBecause = this.staleReason(ticket);
    if (staleBecause) {
      logger.debug('Dropping stale analysis result', {
        reason: staleBecause,
        sequence: ticket.sequence,
        findings: findings.length,
      });
      return null;
    }

    return findings;
  }

  /**
   * Make every in-flight request stale
   */
  invalidate(): void {
    this.sequence++;
  }

  get latestSequence(): number {
    return this.sequence;
  }

  private staleReason(ticket: AnalysisTicket): string | null {
    const current = this.currentTarget();
    if (current.epoch !== ticket.epoch) return 'session ended';
    if (current.elementId !== ticket.elementId) return 'element changed';
    if (this.sequence !== ticket.sequence) return 'superseded by newer request';
    return null;
  }
}

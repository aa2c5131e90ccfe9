import type { LoggerMethods } from '@pagewise/logger';
import type {
  BudgetCheck,
  BudgetReservation,
  BudgetStatusTier,
  BudgetWindow,
  BudgetWindowStatus,
  CostSummary,
  DailyCostSummary,
  SpendRecord,
} from '@pagewise/model';

import { meanBy, sumBy } from 'es-toolkit';

import { BUDGET_LEDGER } from '../config/constants';
import { ContractViolationError } from '../errors/contract-violation-error';

/** Options for BudgetLedger */
export interface BudgetLedgerOptions {
  /** Estimated USD cost of one page analysis (default: 0.00765) */
  costPerCall?: number;
  /** Daily limit in USD (default: 5) */
  dailyLimit?: number;
  /** Weekly limit in USD (default: 25) */
  weeklyLimit?: number;
  /** Monthly limit in USD (default: 100) */
  monthlyLimit?: number;
  /** Daily utilization at which the status becomes WARNING (default: 0.8) */
  warningThreshold?: number;
  /** Daily utilization at which the status becomes CRITICAL (default: 0.95) */
  stopThreshold?: number;
  /** Millisecond clock (default: Date.now) */
  clock?: () => number;
}

/** Input to BudgetLedger.record; the timestamp defaults to the ledger clock */
export type SpendInput = Omit<SpendRecord, 'timestamp'> & {
  timestamp?: number;
};

const WINDOWS: readonly BudgetWindow[] = ['daily', 'weekly', 'monthly'];

/** Local calendar date as YYYY-MM-DD */
export function toLocalDateKey(timestamp: number): string {
  const date = new Date(timestamp);
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * In-memory, append-only record of analyzer spend with daily, weekly and
 * monthly limits.
 *
 * - daily: the current local calendar day
 * - weekly: the trailing 7 × 24 hours
 * - monthly: the trailing 30 × 24 hours
 *
 * `reserve`, `record` and `release` are synchronous, so concurrent workers
 * on the event loop never interleave inside them. A caller that checks
 * availability and reserves without awaiting in between holds its share
 * of the budget until it releases it; pending reservations count against
 * every window. The ledger reports what is affordable; it never trims a
 * caller's candidates.
 */
export class BudgetLedger {
  readonly costPerCall: number;
  private readonly limits: Record<BudgetWindow, number>;
  private readonly warningThreshold: number;
  private readonly stopThreshold: number;
  private readonly clock: () => number;
  private readonly records: SpendRecord[] = [];
  private readonly dailySummaries = new Map<string, DailyCostSummary>();
  /** Reservations with pages not yet recorded, by id */
  private readonly held = new Map<
    number,
    { reservation: BudgetReservation; pagesLeft: number }
  >();
  private nextReservationId = 1;

  constructor(
    private readonly logger: LoggerMethods,
    options?: BudgetLedgerOptions,
  ) {
    this.costPerCall =
      options?.costPerCall ?? BUDGET_LEDGER.DEFAULT_COST_PER_CALL;
    this.limits = {
      daily: options?.dailyLimit ?? BUDGET_LEDGER.DEFAULT_DAILY_LIMIT,
      weekly: options?.weeklyLimit ?? BUDGET_LEDGER.DEFAULT_WEEKLY_LIMIT,
      monthly: options?.monthlyLimit ?? BUDGET_LEDGER.DEFAULT_MONTHLY_LIMIT,
    };
    this.warningThreshold =
      options?.warningThreshold ?? BUDGET_LEDGER.DEFAULT_WARNING_THRESHOLD;
    this.stopThreshold =
      options?.stopThreshold ?? BUDGET_LEDGER.DEFAULT_STOP_THRESHOLD;
    this.clock = options?.clock ?? Date.now;

    ContractViolationError.assert(
      this.costPerCall > 0,
      `costPerCall must be positive, got ${this.costPerCall}`,
    );
    for (const window of WINDOWS) {
      ContractViolationError.assert(
        this.limits[window] >= 0,
        `${window} limit must not be negative, got ${this.limits[window]}`,
      );
    }
  }

  /**
   * Check whether `candidatePageCount` more analyses fit in every window.
   *
   * @throws ContractViolationError for negative or non-integer counts
   */
  checkAvailability(
    candidatePageCount: number,
    costPerPage: number = this.costPerCall,
  ): BudgetCheck {
    ContractViolationError.assert(
      Number.isInteger(candidatePageCount) && candidatePageCount >= 0,
      `candidatePageCount must be a non-negative integer, got ${candidatePageCount}`,
    );
    ContractViolationError.assert(
      costPerPage > 0,
      `costPerPage must be positive, got ${costPerPage}`,
    );

    const now = this.clock();
    const windows = {
      daily: this.computeWindowStatus('daily', now),
      weekly: this.computeWindowStatus('weekly', now),
      monthly: this.computeWindowStatus('monthly', now),
    };

    let limitingWindow: BudgetWindow = 'daily';
    for (const window of WINDOWS) {
      if (windows[window].remaining < windows[limitingWindow].remaining) {
        limitingWindow = window;
      }
    }

    const remaining = windows[limitingWindow].remaining;
    const estimatedCost = candidatePageCount * costPerPage;
    const canAffordAllPages =
      estimatedCost <= remaining + BUDGET_LEDGER.AFFORDABILITY_EPSILON;
    const maxAffordablePages = canAffordAllPages
      ? candidatePageCount
      : Math.min(
          candidatePageCount,
          Math.floor(
            remaining / costPerPage + BUDGET_LEDGER.AFFORDABILITY_EPSILON,
          ),
        );
    const status = windows.daily.status;

    const recommendations: string[] = [];
    if (!canAffordAllPages) {
      recommendations.push(
        `Reduce pages from ${candidatePageCount} to ${maxAffordablePages} to stay within the ${limitingWindow} budget`,
      );
    }
    if (status === 'WARNING') {
      recommendations.push(
        'Approaching budget limit - consider text-only processing for remaining documents',
      );
    } else if (status === 'CRITICAL') {
      recommendations.push(
        'Budget nearly exhausted - prioritize only highest-value pages',
      );
    }

    return {
      candidatePageCount,
      costPerPage,
      estimatedCost,
      windows,
      canAffordAllPages,
      maxAffordablePages,
      limitingWindow,
      status,
      recommendations,
    };
  }

  /**
   * Hold `pageCount × costPerPage` against every window until the calls are
   * recorded or the reservation is released.
   *
   * @throws ContractViolationError for negative or non-integer counts
   */
  reserve(
    pageCount: number,
    costPerPage: number = this.costPerCall,
  ): BudgetReservation {
    ContractViolationError.assert(
      Number.isInteger(pageCount) && pageCount >= 0,
      `pageCount must be a non-negative integer, got ${pageCount}`,
    );
    ContractViolationError.assert(
      costPerPage > 0,
      `costPerPage must be positive, got ${costPerPage}`,
    );

    const reservation: BudgetReservation = Object.freeze({
      id: this.nextReservationId++,
      pageCount,
      costPerPage,
    });
    this.held.set(reservation.id, { reservation, pagesLeft: pageCount });

    this.logger.debug(
      `[BudgetLedger] Reserved $${(pageCount * costPerPage).toFixed(5)} for ${pageCount} pages (reservation ${reservation.id})`,
    );
    return reservation;
  }

  /**
   * Drop whatever a reservation still holds. Releasing twice is a no-op.
   */
  release(reservation: BudgetReservation): void {
    const entry = this.held.get(reservation.id);
    if (!entry) return;
    this.held.delete(reservation.id);

    if (entry.pagesLeft > 0) {
      this.logger.debug(
        `[BudgetLedger] Released $${(entry.pagesLeft * reservation.costPerPage).toFixed(5)} unused by reservation ${reservation.id}`,
      );
    }
  }

  /**
   * Append a spend record. Failed calls are recorded with the cost they
   * actually incurred. With a reservation, one page's share of it is
   * settled by this record.
   */
  record(input: SpendInput, reservation?: BudgetReservation): SpendRecord {
    ContractViolationError.assert(
      Number.isFinite(input.costUsd) && input.costUsd >= 0,
      `costUsd must be a non-negative number, got ${input.costUsd}`,
    );

    const record: SpendRecord = Object.freeze({
      ...input,
      timestamp: input.timestamp ?? this.clock(),
    });
    this.records.push(record);
    this.updateDailySummary(record);
    if (reservation) this.settle(reservation);

    this.logger.debug(
      `[BudgetLedger] Recorded page ${record.pageNumber}: $${record.costUsd.toFixed(5)} (${record.success ? 'success' : 'failed'})`,
    );

    const daily = this.computeWindowStatus('daily', this.clock());
    const usage = `Daily budget ${(daily.utilization * 100).toFixed(0)}% used ($${daily.spent.toFixed(2)}/$${daily.limit.toFixed(2)})`;
    if (daily.status === 'CRITICAL') {
      this.logger.warn(`[BudgetLedger] CRITICAL: ${usage}`);
    } else if (daily.status === 'WARNING') {
      this.logger.warn(`[BudgetLedger] WARNING: ${usage}`);
    }

    return record;
  }

  getWindowStatus(window: BudgetWindow): BudgetWindowStatus {
    return this.computeWindowStatus(window, this.clock());
  }

  getCostSummary(window: BudgetWindow = 'daily'): CostSummary {
    const now = this.clock();
    const status = this.computeWindowStatus(window, now);
    const calls = this.recordsInWindow(window, now);
    const successful = calls.filter((call) => call.success).length;

    return {
      window,
      totalSpent: status.spent,
      budget: status.limit,
      remaining: status.remaining,
      utilizationPct:
        status.limit > 0 ? (status.spent * 100) / status.limit : 0,
      status: status.status,
      calls: {
        total: calls.length,
        successful,
        failed: calls.length - successful,
      },
      averageCostPerCall: calls.length > 0 ? status.spent / calls.length : 0,
      efficiency: {
        averageDurationMs:
          calls.length > 0 ? meanBy(calls, (call) => call.durationMs) : 0,
        averageImageSizeKb:
          calls.length > 0 ? meanBy(calls, (call) => call.imageSizeKb) : 0,
        successRatePct:
          calls.length > 0 ? (successful / calls.length) * 100 : 0,
      },
    };
  }

  /**
   * Running totals for a local calendar day (default: today).
   */
  getDailySummary(date: string = toLocalDateKey(this.clock())): DailyCostSummary {
    const summary = this.dailySummaries.get(date);
    return summary
      ? { ...summary }
      : {
          date,
          calls: 0,
          successful: 0,
          failed: 0,
          totalCost: 0,
          averageCostPerCall: 0,
          utilizationPct: 0,
        };
  }

  getRecords(): readonly SpendRecord[] {
    return [...this.records];
  }

  private settle(reservation: BudgetReservation): void {
    const entry = this.held.get(reservation.id);
    if (!entry) return;
    entry.pagesLeft = Math.max(entry.pagesLeft - 1, 0);
  }

  private reservedTotal(): number {
    return sumBy(
      [...this.held.values()],
      ({ reservation, pagesLeft }) => pagesLeft * reservation.costPerPage,
    );
  }

  private recordsInWindow(window: BudgetWindow, now: number): SpendRecord[] {
    if (window === 'daily') {
      const today = toLocalDateKey(now);
      return this.records.filter(
        (record) => toLocalDateKey(record.timestamp) === today,
      );
    }
    const span =
      window === 'weekly' ? BUDGET_LEDGER.WEEK_MS : BUDGET_LEDGER.MONTH_MS;
    return this.records.filter((record) => now - record.timestamp < span);
  }

  private computeWindowStatus(
    window: BudgetWindow,
    now: number,
  ): BudgetWindowStatus {
    const limit = this.limits[window];
    const spent = sumBy(this.recordsInWindow(window, now), (r) => r.costUsd);
    const reserved = this.reservedTotal();
    const utilization = limit > 0 ? spent / limit : 1;

    return {
      window,
      spent,
      limit,
      reserved,
      remaining: Math.max(limit - spent - reserved, 0),
      utilization,
      status: this.tierFor(utilization),
    };
  }

  private tierFor(utilization: number): BudgetStatusTier {
    if (utilization >= this.stopThreshold) return 'CRITICAL';
    if (utilization >= this.warningThreshold) return 'WARNING';
    return 'NORMAL';
  }

  private updateDailySummary(record: SpendRecord): void {
    const date = toLocalDateKey(record.timestamp);
    const summary = this.getDailySummary(date);
    summary.calls++;
    if (record.success) summary.successful++;
    else summary.failed++;
    summary.totalCost += record.costUsd;
    summary.averageCostPerCall = summary.totalCost / summary.calls;
    summary.utilizationPct =
      this.limits.daily > 0
        ? (summary.totalCost * 100) / this.limits.daily
        : 0;
    this.dailySummaries.set(date, summary);
  }
}

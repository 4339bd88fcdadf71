import type { IdentityFailure, ScanJob, ScanStatus } from "./types";

interface OrderedFailure {
  order: number;
  failure: IdentityFailure;
}

/**
 * Mutable state of one scan run. Only the owning processor writes to it;
 * everyone else reads frozen copies from `toJSON()`.
 *
 * idle -> running -> completed | failed
 */
export class ScanJobTracker {
  readonly id: number;
  private _status: ScanStatus = "idle";
  private rootPath: string | null = null;
  private totalIdentities = 0;
  private processedCount = 0;
  private successCount = 0;
  private cachedCount = 0;
  private failures: OrderedFailure[] = [];
  private startedAt: string | null = null;
  private finishedAt: string | null = null;
  private failureReason: string | null = null;

  constructor(id: number) {
    this.id = id;
  }

  get status(): ScanStatus {
    return this._status;
  }

  start(rootPath: string): void {
    this.expect("idle", "start");
    this._status = "running";
    this.rootPath = rootPath;
    this.startedAt = new Date().toISOString();
  }

  setTotal(total: number): void {
    this.expect("running", "size");
    this.totalIdentities = total;
  }

  recordSuccess(options: { cached: boolean }): void {
    this.expect("running", "update");
    this.processedCount++;
    this.successCount++;
    if (options.cached) this.cachedCount++;
  }

  /** `order` is the identity's position in the scan, used to order the error list. */
  recordFailure(failure: IdentityFailure, order: number): void {
    this.expect("running", "update");
    this.processedCount++;
    this.failures.push({ order, failure });
  }

  complete(): void {
    this.expect("running", "complete");
    this._status = "completed";
    this.finishedAt = new Date().toISOString();
  }

  fail(reason: string): void {
    this.expect("running", "fail");
    this._status = "failed";
    this.failureReason = reason;
    this.finishedAt = new Date().toISOString();
  }

  toJSON(): ScanJob {
    const errorList = [...this.failures]
      .sort((a, b) => a.order - b.order)
      .map(({ failure }) => Object.freeze({ ...failure }));

    return Object.freeze({
      id: this.id,
      status: this._status,
      rootPath: this.rootPath,
      totalIdentities: this.totalIdentities,
      processedCount: this.processedCount,
      successCount: this.successCount,
      cachedCount: this.cachedCount,
      errorList: Object.freeze(errorList),
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
      failureReason: this.failureReason,
    });
  }

  private expect(status: ScanStatus, action: string): void {
    if (this._status !== status) {
      throw new Error(`Cannot ${action} scan #${this.id}: status is ${this._status}`);
    }
  }
}

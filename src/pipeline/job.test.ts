import { ScanJobTracker } from "./job";

describe("ScanJobTracker", () => {
  it("starts idle with empty counters", () => {
    const job = new ScanJobTracker(1).toJSON();

    expect(job.status).toBe("idle");
    expect(job.processedCount).toBe(0);
    expect(job.errorList).toEqual([]);
    expect(job.startedAt).toBeNull();
  });

  it("counts successes and failures while running", () => {
    const job = new ScanJobTracker(1);
    job.start("/archive");
    job.setTotal(3);
    job.recordSuccess({ cached: false });
    job.recordSuccess({ cached: true });
    job.recordFailure({ identity: "Bob", reason: "no-face", message: "No face detected" }, 1);

    const snapshot = job.toJSON();
    expect(snapshot).toMatchObject({
      status: "running",
      rootPath: "/archive",
      totalIdentities: 3,
      processedCount: 3,
      successCount: 2,
      cachedCount: 1,
    });
    expect(snapshot.startedAt).not.toBeNull();
    expect(snapshot.finishedAt).toBeNull();
  });

  it("orders the error list by identity position", () => {
    const job = new ScanJobTracker(1);
    job.start("/archive");
    job.recordFailure({ identity: "Zoe", reason: "no-image", message: "none" }, 5);
    job.recordFailure({ identity: "Ann", reason: "no-face", message: "none" }, 0);

    expect(job.toJSON().errorList.map((failure) => failure.identity)).toEqual(["Ann", "Zoe"]);
  });

  it("completes and stamps finishedAt", () => {
    const job = new ScanJobTracker(1);
    job.start("/archive");
    job.complete();

    expect(job.status).toBe("completed");
    expect(job.toJSON().finishedAt).not.toBeNull();
  });

  it("records the failure reason", () => {
    const job = new ScanJobTracker(1);
    job.start("/archive");
    job.fail("root vanished");

    expect(job.toJSON()).toMatchObject({ status: "failed", failureReason: "root vanished" });
  });

  it("rejects illegal transitions", () => {
    const job = new ScanJobTracker(7);

    expect(() => job.complete()).toThrow("Cannot complete scan #7: status is idle");
    job.start("/archive");
    expect(() => job.start("/other")).toThrow("Cannot start scan #7: status is running");
    job.complete();
    expect(() => job.recordSuccess({ cached: false })).toThrow("Cannot update scan #7: status is completed");
    expect(() => job.fail("late")).toThrow("Cannot fail scan #7: status is completed");
  });

  it("hands out frozen copies", () => {
    const job = new ScanJobTracker(1);
    job.start("/archive");
    const before = job.toJSON();
    job.recordSuccess({ cached: false });

    expect(Object.isFrozen(before)).toBe(true);
    expect(before.processedCount).toBe(0);
  });
});

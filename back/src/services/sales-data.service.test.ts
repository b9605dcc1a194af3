import { describe, it, expect, vi } from "vitest";
import type { SalesRecord } from "../models/sales-record.model.js";
import type { SalesRecordSource } from "../repositories/sales-data.repository.js";
import {
  connectionRefused,
  createSalesRecord,
} from "../test/sales-record.factory.js";
import { CONNECTION_WARNING, SalesDataService } from "./sales-data.service.js";

function createSource(findAll: () => Promise<SalesRecord[]>) {
  const source: SalesRecordSource = { findAll: vi.fn(findAll) };
  return source;
}

describe("SalesDataService", () => {
  it("should return the fetched records without a warning", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const records = [createSalesRecord()];
    const service = new SalesDataService(
      createSource(async () => records),
      { now: () => 5_000 },
    );

    const snapshot = await service.load();

    expect(snapshot).toEqual({
      records,
      refreshedAt: new Date(5_000),
      warning: null,
    });
    expect(warn).not.toHaveBeenCalled();
  });

  it("should serve the cached records within the TTL", async () => {
    let time = 0;
    const source = createSource(async () => [createSalesRecord()]);
    const service = new SalesDataService(source, {
      ttlMs: 60_000,
      now: () => time,
    });

    const first = await service.load();
    time = 30_000;
    const second = await service.load();
    time = 60_000;
    await service.load();

    expect(second.records).toBe(first.records);
    expect(source.findAll).toHaveBeenCalledTimes(2);
  });

  it("should recover when a later attempt succeeds", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
    const sleep = vi.fn(async () => {});
    const records = [createSalesRecord()];
    const findAll = vi
      .fn<() => Promise<SalesRecord[]>>()
      .mockRejectedValueOnce(connectionRefused())
      .mockRejectedValueOnce(connectionRefused())
      .mockResolvedValueOnce(records);
    const service = new SalesDataService(
      { findAll },
      { sleep, retryDelayMs: 10_000 },
    );

    const snapshot = await service.load();

    expect(snapshot.records).toBe(records);
    expect(snapshot.warning).toBeNull();
    expect(findAll).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[10_000], [10_000]]);
    expect(warn).not.toHaveBeenCalled();
  });

  it("should fall back to an empty collection with one warning", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
    const sleep = vi.fn(async () => {});
    const findAll = vi.fn(async (): Promise<SalesRecord[]> => {
      throw connectionRefused();
    });
    const service = new SalesDataService({ findAll }, { sleep });

    const snapshot = await service.load();

    expect(snapshot).toEqual({
      records: [],
      refreshedAt: null,
      warning: CONNECTION_WARNING,
    });
    expect(findAll).toHaveBeenCalledTimes(5);
    expect(sleep).toHaveBeenCalledTimes(4);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("should try the database again after a failed load", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
    const records = [createSalesRecord()];
    const findAll = vi
      .fn<() => Promise<SalesRecord[]>>()
      .mockRejectedValueOnce(connectionRefused())
      .mockResolvedValueOnce(records);
    const service = new SalesDataService(
      { findAll },
      { maxAttempts: 1, sleep: async () => {} },
    );

    expect((await service.load()).warning).toBe(CONNECTION_WARNING);
    expect((await service.load()).records).toBe(records);
  });

  it("should propagate errors that are not connection failures", async () => {
    const sleep = vi.fn(async () => {});
    const authError = Object.assign(
      new Error("password authentication failed"),
      { code: "28P01" },
    );
    const findAll = vi.fn(async (): Promise<SalesRecord[]> => {
      throw authError;
    });
    const service = new SalesDataService({ findAll }, { sleep });

    await expect(service.load()).rejects.toBe(authError);
    expect(findAll).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("should fetch once for concurrent loads", async () => {
    const findAll = vi.fn(async () => [createSalesRecord()]);
    const service = new SalesDataService({ findAll });

    const [a, b] = await Promise.all([service.load(), service.load()]);

    expect(findAll).toHaveBeenCalledTimes(1);
    expect(a.records).toBe(b.records);
  });
});

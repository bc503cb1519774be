import { describe, it, expect } from "@jest/globals";
import { KeyedMutex } from "@/utils/KeyedMutex";
import { deferred } from "../helpers/deferred";

describe("KeyedMutex", () => {
  it("같은 키는 순서대로 실행해야 함", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive("job-1", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = mutex.runExclusive("job-1", async () => {
      order.push("second");
    });

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first", "second"]);
  });

  it("다른 키는 서로 기다리지 않아야 함", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const blocked = mutex.runExclusive("job-1", async () => {
      await gate.promise;
      order.push("job-1");
    });
    await mutex.runExclusive("job-2", async () => {
      order.push("job-2");
    });
    gate.resolve();
    await blocked;

    expect(order).toEqual(["job-2", "job-1"]);
  });

  it("작업이 끝나면 키를 정리해야 함", async () => {
    const mutex = new KeyedMutex();

    await mutex.runExclusive("job-1", async () => {
      expect(mutex.size).toBe(1);
    });

    expect(mutex.size).toBe(0);
  });

  it("콜백 예외는 전파하고 락은 해제해야 함", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("job-1", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(mutex.size).toBe(0);
    await expect(mutex.runExclusive("job-1", async () => "ok")).resolves.toBe("ok");
  });
});

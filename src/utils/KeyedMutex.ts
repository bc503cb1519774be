/**
 * 키별 Mutex (Job ID 단위 직렬화)
 * 대기자가 없어지면 Mutex 제거
 */

import { Mutex } from "async-mutex";

interface MutexEntry {
  mutex: Mutex;
  holders: number;
}

export class KeyedMutex {
  private readonly entries = new Map<string, MutexEntry>();

  async runExclusive<T>(key: string, callback: () => Promise<T>): Promise<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), holders: 0 };
      this.entries.set(key, entry);
    }

    entry.holders++;
    const release = await entry.mutex.acquire();
    try {
      return await callback();
    } finally {
      release();
      entry.holders--;
      if (entry.holders === 0) {
        this.entries.delete(key);
      }
    }
  }

  /** 보유 중인 키 수 */
  get size(): number {
    return this.entries.size;
  }
}

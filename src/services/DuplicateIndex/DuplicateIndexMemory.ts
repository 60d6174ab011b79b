import type {
  DuplicateIndex,
  DuplicateKey,
  IndexEntry,
  RegisterResult,
} from "./DuplicateIndex";

/**
 * 單次整理使用的記憶體索引，只增不減。
 * register 內沒有 await，在同一個 event loop 上對並行的 worker 也是原子的。
 */
export class DuplicateIndexMemory implements DuplicateIndex {
  private readonly entries = new Map<string, IndexEntry>();

  register(key: DuplicateKey, entry: IndexEntry): RegisterResult {
    if (key.kind === "unknown") return { accepted: true };
    const id = serialize(key);
    const existing = this.entries.get(id);
    if (existing) return { accepted: false, existing };
    this.entries.set(id, entry);
    return { accepted: true };
  }

  get size() {
    return this.entries.size;
  }
}

function serialize(key: Extract<DuplicateKey, { kind: "known" }>) {
  return `${key.epochSecond}:${key.size}`;
}

import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { TraversalIssue } from "@/types";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
  ScanResult,
} from "./FileSystemScanner";

export function normalizeExtensions(exts: readonly string[]): string[] {
  return exts.map((e) => {
    const lower = e.trim().toLowerCase();
    return lower.startsWith(".") ? lower : `.${lower}`;
  });
}

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<ScanResult, ScanError>> {
    const root = path.resolve(rootPath);
    const isRecursive = options?.recursive ?? true;
    const allowExtsSet = new Set(normalizeExtensions(options?.allowExts ?? []));
    const excluded = new Set(
      (options?.excludeDirs ?? []).map((d) => path.resolve(d))
    );

    const rootEntries = await readEntries(root);
    if (!rootEntries.ok) {
      return err({ type: "SCAN_FAILED", message: rootEntries.error });
    }

    const files: string[] = [];
    const issues: TraversalIssue[] = [];

    const visit = async (dir: string, entries: Dirent[]) => {
      for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          if (!isRecursive || excluded.has(full)) continue;
          const children = await readEntries(full);
          if (!children.ok) {
            issues.push({ path: full, message: children.error });
            continue;
          }
          await visit(full, children.value);
          continue;
        }
        // symlink 與特殊檔案不處理
        if (!entry.isFile()) continue;
        if (allowExtsSet.size > 0) {
          const ext = path.extname(entry.name).toLowerCase();
          if (!allowExtsSet.has(ext)) continue;
        }
        files.push(full);
      }
    };

    await visit(root, rootEntries.value);
    return ok({ files, issues });
  }
}

async function readEntries(dir: string): Promise<Result<Dirent[], string>> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return ok(entries);
  } catch (e) {
    return err(e instanceof Error ? e.message : String(e));
  }
}

import type { Result } from "~shared/utils/Result";

import type { CaptureTime } from "@/types";

/** 目標路徑的現況；每次都重新查詢，不做快取 */
export type DestinationState =
  | { kind: "free" }
  /** 本次整理已分配給其他檔案 */
  | { kind: "reserved" }
  | { kind: "occupied"; size: number; isFile: boolean };

export type DestinationLookup = (targetPath: string) => Promise<DestinationState>;

export type PlanInput = {
  captureTime: CaptureTime;
  fileName: string;
  size: number;
};

export type PlannedPath =
  | { kind: "transfer"; targetPath: string; renamed: boolean }
  /** 目標已有同名同大小的檔案，視為已整理過 */
  | { kind: "already-organized"; targetPath: string };

export type PlanError = {
  type: "COLLISION_EXHAUSTED" | "LOOKUP_FAILED";
  message: string;
};

export interface PathPlanner {
  /** 相對於目標根目錄的資料夾 */
  directoryFor(captureTime: CaptureTime): string;
  plan(
    input: PlanInput,
    lookup: DestinationLookup
  ): Promise<Result<PlannedPath, PlanError>>;
}

import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import {
  defaultDateFormat,
  defaultUnknownDateDir,
  maxCollisionSuffix,
} from "@/constants";
import type { CaptureTime } from "@/types";

import { renderDateSegments } from "./DateTemplate";
import type {
  DestinationLookup,
  DestinationState,
  PathPlanner,
  PlanError,
  PlanInput,
  PlannedPath,
} from "./PathPlanner";

/** 第 0 個是原檔名，之後為 name_1.ext、name_2.ext… */
export function candidateName(fileName: string, index: number) {
  if (index === 0) return fileName;
  const ext = path.extname(fileName);
  const stem = fileName.slice(0, fileName.length - ext.length);
  return `${stem}_${index}${ext}`;
}

export class PathPlannerDefault implements PathPlanner {
  private readonly targetRoot: string;
  private readonly dateFormat: string;
  private readonly unknownDateDir: string;
  private readonly maxSuffix: number;

  constructor(config: {
    targetRoot: string;
    dateFormat?: string;
    unknownDateDir?: string;
    maxSuffix?: number;
  }) {
    this.targetRoot = path.resolve(config.targetRoot);
    this.dateFormat = config.dateFormat ?? defaultDateFormat;
    this.unknownDateDir = config.unknownDateDir ?? defaultUnknownDateDir;
    this.maxSuffix = config.maxSuffix ?? maxCollisionSuffix;
  }

  directoryFor(captureTime: CaptureTime): string {
    if (captureTime.kind === "unknown") return this.unknownDateDir;
    return path.join(
      ...renderDateSegments(captureTime.wallClock, this.dateFormat)
    );
  }

  async plan(
    input: PlanInput,
    lookup: DestinationLookup
  ): Promise<Result<PlannedPath, PlanError>> {
    const dir = path.join(this.targetRoot, this.directoryFor(input.captureTime));

    for (let i = 0; i <= this.maxSuffix; i++) {
      const targetPath = path.join(dir, candidateName(input.fileName, i));
      let state: DestinationState;
      try {
        state = await lookup(targetPath);
      } catch (e) {
        return err({
          type: "LOOKUP_FAILED",
          message: `無法檢查目標 ${targetPath}: ${
            e instanceof Error ? e.message : String(e)
          }`,
        });
      }

      if (state.kind === "free") {
        return ok({ kind: "transfer", targetPath, renamed: i > 0 });
      }
      if (
        state.kind === "occupied" &&
        state.isFile &&
        state.size === input.size
      ) {
        return ok({ kind: "already-organized", targetPath });
      }
    }

    return err({
      type: "COLLISION_EXHAUSTED",
      message: `${dir} 中 ${input.fileName} 的可用檔名已用盡（上限 ${this.maxSuffix}）`,
    });
  }
}

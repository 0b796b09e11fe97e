/**
 * 回填报告
 * 逐条记录每个翻译单元的结果，不包含任何重试或恢复逻辑
 */
import type { MatchOutcome, MatchStatus, RegionKind } from "../types";

export const REPORT_HEADER = ["id", "file", "status", "method", "message"] as const;

export type StatusCounts = Record<MatchStatus, number>;

// TSV 字段中不能出现制表符和换行
function tsvField(value: string): string {
  return value.replace(/[\t\r\n]+/g, " ");
}

export class PatchReport {
  private readonly outcomes: MatchOutcome[] = [];

  add(outcome: MatchOutcome): MatchOutcome {
    const frozen = Object.freeze({ ...outcome });
    this.outcomes.push(frozen);
    return frozen;
  }

  ok(unitId: string, file: string, methodTag: string, regionKind: RegionKind): MatchOutcome {
    return this.add({
      unitId,
      file,
      status: "OK",
      methodTag,
      regionKind,
      message: `region=${regionKind}`,
      applied: true,
    });
  }

  noop(unitId: string, file: string, regionKind: RegionKind): MatchOutcome {
    return this.add({
      unitId,
      file,
      status: "NOOP",
      methodTag: "unchanged",
      regionKind,
      message: `region=${regionKind}`,
      applied: false,
    });
  }

  warn(
    unitId: string,
    file: string,
    methodTag: string,
    message: string,
    regionKind: RegionKind,
    applied: boolean
  ): MatchOutcome {
    return this.add({ unitId, file, status: "WARN", methodTag, regionKind, message, applied });
  }

  fail(unitId: string, file: string, methodTag: string, message = ""): MatchOutcome {
    return this.add({ unitId, file, status: "FAIL", methodTag, message, applied: false });
  }

  get rows(): ReadonlyArray<MatchOutcome> {
    return this.outcomes;
  }

  get size(): number {
    return this.outcomes.length;
  }

  counts(): StatusCounts {
    const counts: StatusCounts = { OK: 0, NOOP: 0, WARN: 0, FAIL: 0 };
    for (const outcome of this.outcomes) {
      counts[outcome.status]++;
    }
    return counts;
  }

  /**
   * 追加另一份报告的全部结果（保持顺序）
   */
  merge(other: PatchReport): this {
    this.outcomes.push(...other.rows);
    return this;
  }

  toTsv(): string {
    const lines = [REPORT_HEADER.join("\t")];
    for (const r of this.outcomes) {
      lines.push([r.unitId, r.file, r.status, r.methodTag, r.message].map(tsvField).join("\t"));
    }
    return lines.join("\n") + "\n";
  }
}

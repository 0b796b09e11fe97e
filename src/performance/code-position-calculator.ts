/**
 * 代码位置计算器
 * 预计算行起始位置，用二分查找把字符偏移换算成行号，避免反复分割字符串
 */

/**
 * 偏移 <-> 行号换算
 */
export class CodePositionCalculator {
  private readonly lineStartPositions: number[];

  constructor(code: string) {
    this.lineStartPositions = CodePositionCalculator.computeLineStarts(code);
  }

  /**
   * 预计算每行的起始偏移（升序）
   * \n、\r\n 与单独的 \r 都算作一次换行
   */
  static computeLineStarts(code: string): number[] {
    const positions = [0];
    for (let i = 0; i < code.length; i++) {
      const ch = code[i];
      if (ch === "\r" && code[i + 1] === "\n") {
        continue;
      }
      if (ch === "\n" || ch === "\r") {
        positions.push(i + 1);
      }
    }
    return positions;
  }

  /**
   * 偏移所在的行号（1-based）
   */
  lineAt(offset: number): number {
    const starts = this.lineStartPositions;
    let lo = 0;
    let hi = starts.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (starts[mid] <= offset && (mid + 1 === starts.length || offset < starts[mid + 1])) {
        return mid + 1;
      }
      if (offset < starts[mid]) {
        hi = mid - 1;
      } else {
        lo = mid + 1;
      }
    }
    return 1;
  }

  /**
   * 总行数
   */
  getLineCount(): number {
    return this.lineStartPositions.length;
  }
}

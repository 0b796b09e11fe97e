/**
 * 性能相关工具索引文件
 */

export { CodePositionCalculator } from "./code-position-calculator";

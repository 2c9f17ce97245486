/** 与 containsPattern 配套，声明反斜杠为 LIKE 转义符。 */
export const LIKE_ESCAPE = ` ESCAPE '\\'`;

/**
 * 模糊查询参数：转义用户输入中的 `%`、`_` 与 `\`，再包上首尾通配符。
 */
export function containsPattern(value: string): string {
  return `%${value.replace(/[\\%_]/g, '\\$&')}%`;
}

/** UTF-32 の1コードポイントあたりの16進桁数 */
const UTF32_HEX_WIDTH = 8;

/**
 * UTF-8文字（複数コードポイントの書記素でも可）を16進のコードポイント列に変換
 *
 * 各コードポイントを8桁（UTF-32幅）で連結し、文字列全体の先頭の0だけを除去する。
 * 2つ目以降のコードポイントのゼロ埋めは残る。
 *
 * | 入力 | 出力 |
 * |------|------|
 * | 😀 | 1f600 |
 * | ❤️ | 27640000fe0f |
 * | 🇺🇸 | 1f1fa0001f1f8 |
 *
 * @param char 変換する文字
 * @returns 16進文字列（空文字列の場合は空文字列）
 */
export function unicodeFromUtf8(char: string): string {
  let hex = '';
  // for...of はサロゲートペアを1コードポイントとして列挙する
  for (const symbol of char) {
    const codePoint = symbol.codePointAt(0) ?? 0;
    hex += codePoint.toString(16).padStart(UTF32_HEX_WIDTH, '0');
  }
  return hex.replace(/^0+/, '');
}

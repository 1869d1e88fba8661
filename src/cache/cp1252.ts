// Windows-1252 differs from Latin-1 only in 0x80..0x9F. The five undefined
// slots (0x81, 0x8D, 0x8F, 0x90, 0x9D) map to the C1 control with the same value.
const HIGH_BLOCK =
  "€\u0081‚ƒ„…†‡ˆ‰Š‹Œ\u008dŽ\u008f" +
  "\u0090‘’“”•–—˜™š›œ\u009džŸ";

const BYTE_BY_CODE_POINT = new Map<number, number>(
  Array.from(HIGH_BLOCK, (ch, i) => [ch.charCodeAt(0), 0x80 + i]),
);

export function decodeCp1252(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) {
    out += b >= 0x80 && b < 0xa0 ? HIGH_BLOCK.charAt(b - 0x80) : String.fromCharCode(b);
  }
  return out;
}

export function encodeCp1252(text: string): Uint8Array {
  const out: number[] = [];
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    const mapped = BYTE_BY_CODE_POINT.get(cp);

    if (mapped !== undefined) out.push(mapped);
    else if (cp <= 0x7f || (cp >= 0xa0 && cp <= 0xff)) out.push(cp);
    else throw new Error(`Cannot encode character U+${cp.toString(16).toUpperCase()} in windows-1252`);
  }
  return Uint8Array.from(out);
}

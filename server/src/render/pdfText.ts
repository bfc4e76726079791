// Standard 14 fonts in pdf-lib encode with WinAnsi; anything else throws at draw time.

const REPLACEMENTS: Record<string, string> = {
  "‘": "'",
  "’": "'",
  "“": '"',
  "”": '"',
  "–": "-",
  "—": "-",
  "…": "...",
  "•": "*",
  " ": " ",
  "\t": " ",
};

export function toWinAnsi(text: string): string {
  let out = "";
  for (const ch of text) {
    const replacement = REPLACEMENTS[ch];
    if (replacement !== undefined) {
      out += replacement;
      continue;
    }
    const code = ch.codePointAt(0) ?? 0;
    if (ch === "\n" || (code >= 0x20 && code <= 0x7e) || (code >= 0xa1 && code <= 0xff)) {
      out += ch;
    } else if (code !== 0x0d) {
      out += "?";
    }
  }
  return out;
}

export function singleLine(text: string): string {
  return text.replace(/\s*\n\s*/g, " ");
}

const REPLACEMENTS: [from: RegExp, to: string][] = [
  // en dash, em dash, figure dash, horizontal bar, bullet, middle dot
  [/[‒–—―•·]/g, "-"],
  [/×/g, "x"],
];

/** Map non-ASCII dashes, bullets and "×" to ASCII and collapse runs of spaces/tabs. */
export function normalizeText(text: string): string {
  let out = text;
  for (const [from, to] of REPLACEMENTS) {
    out = out.replace(from, to);
  }
  return out.replace(/[ \t]{2,}/g, " ");
}

/**
 * Frame padding for output file names.
 *
 * Product names in a flattened layer carry the frame they were written for
 * (`beauty.1001.exr`). The farm wants a frame pattern instead, so the frame
 * digits become a printf-style token of the same width (`beauty.%04d.exr`).
 */

/** A frame token already present: printf (`%04d`), Houdini (`$F4`) or hash padding. */
const FRAME_TOKEN = /%0?\d*d|\$F\d*|#/;

/** Frame digits: the end of the stem, after a `.` or `_` separator or alone. */
const FRAME_DIGITS = /(^|[._])(\d+)$/;

export interface FileNameParts {
  dir: string;
  stem: string;
  ext: string;
}

/** Split a path-like literal into directory, stem and extension. Works on `/` and `\` separators. */
export function splitFileName(literal: string): FileNameParts {
  const sep = Math.max(literal.lastIndexOf("/"), literal.lastIndexOf("\\"));
  const dir = literal.slice(0, sep + 1);
  const name = literal.slice(sep + 1);

  const dot = name.lastIndexOf(".");
  // `.1001` with nothing after is a frame, not an extension
  if (dot <= 0 || /^\.\d+$/.test(name.slice(dot))) {
    return { dir, stem: name, ext: "" };
  }
  return { dir, stem: name.slice(0, dot), ext: name.slice(dot) };
}

export function hasFrameToken(literal: string): boolean {
  const { stem, ext } = splitFileName(literal);
  return FRAME_TOKEN.test(stem + ext);
}

/** printf token for a frame of `width` digits. */
export function paddingToken(width: number): string {
  return `%0${width}d`;
}

/**
 * Replace the frame number embedded in a file name with a padding token.
 * Directory and extension are left untouched. Names that already carry a
 * frame token come back unchanged, and so do names whose digits are not a
 * separated frame number (`beauty_4k.exr`, `render_v3.exr`).
 */
export function normalizeFramePadding(literal: string): string {
  if (hasFrameToken(literal)) return literal;

  const { dir, stem, ext } = splitFileName(literal);
  const match = FRAME_DIGITS.exec(stem);
  if (!match) return literal;

  const separator = match[1] ?? "";
  const digits = match[2] ?? "";
  const head = stem.slice(0, match.index);
  return `${dir}${head}${separator}${paddingToken(digits.length)}${ext}`;
}

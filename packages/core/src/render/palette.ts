export type PaletteRole = "ctime" | "mtime" | "subCounts" | "size" | "extension" | "file" | "directory";

/** 256-colour SGR ids per role. */
export type Palette = Readonly<Record<PaletteRole, number>>;

export const DEFAULT_PALETTE: Palette = Object.freeze({
  ctime: 63,
  mtime: 98,
  subCounts: 126,
  size: 43,
  extension: 220,
  file: 80,
  directory: 120,
});

/**
 * Everything a column needs besides the entry itself. Built once per
 * listing so every row shares one "now" and one colour decision.
 */
export type RenderContext = Readonly<{
  nowMs: number;
  colour: boolean;
  palette: Palette;
}>;

export function createRenderContext(
  opts: Readonly<{ nowMs: number; colour?: boolean; palette?: Partial<Palette> }>,
): RenderContext {
  return Object.freeze({
    nowMs: opts.nowMs,
    colour: opts.colour !== false,
    palette: Object.freeze({ ...DEFAULT_PALETTE, ...opts.palette }),
  });
}

const SGR_RESET = "\u001b[0m";

export function paint(context: RenderContext, role: PaletteRole, text: string): string {
  if (!context.colour || text.length === 0) return text;
  return `\u001b[38;5;${String(context.palette[role])}m${text}${SGR_RESET}`;
}

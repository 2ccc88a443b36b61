import { z } from "zod";

// Sections
export const SectionLineSchema = z.tuple([z.string(), z.string()]);
export type SectionLine = z.infer<typeof SectionLineSchema>;

/** A titled group of key/value rows; line order is display order. */
export const SectionSchema = z.object({
  title: z.string(),
  lines: z.array(SectionLineSchema),
});
export type Section = z.infer<typeof SectionSchema>;

export function section(title: string, lines: SectionLine[]): Section {
  return { title, lines };
}

// Art
export type ArtBlock = readonly string[];

export const ArtVariantNameSchema = z.enum([
  "wide",
  "medium",
  "narrow",
  "compact",
]);
export type ArtVariantName = z.infer<typeof ArtVariantNameSchema>;

export interface ArtVariants {
  wide: ArtBlock;
  medium: ArtBlock;
  narrow: ArtBlock;
  /** Small logo tried before medium side-by-side and before narrow stacked. */
  compact?: ArtBlock;
}

// Terminal
export interface TerminalGeometry {
  columns: number;
  rows: number;
}

// Layout
export type LayoutChoice =
  | { kind: "side-by-side"; variant: ArtVariantName }
  | { kind: "stacked"; variant: ArtVariantName }
  | { kind: "sections-only" };

// Config
export const HEX_COLOR_REGEX = /^#?[0-9a-fA-F]{6}$/;

export const PaletteSchema = z.object({
  border: z.string(),
  title: z.string(),
  key: z.string(),
  value: z.string(),
  art: z.array(z.string()).max(9),
});
export type Palette = z.infer<typeof PaletteSchema>;

export const DEFAULT_PALETTE: Palette = {
  border: "#FF79C6",
  title: "#FF79C6",
  key: "#BD93F9",
  value: "#8BE9FD",
  art: [
    "#FF0000",
    "#FF8000",
    "#FFFF00",
    "#00FF00",
    "#00FFFF",
    "#00BFFF",
    "#5555FF",
    "#AA55FF",
    "#FF55FF",
  ],
};

/** Raw file shape: every key optional, colors unchecked until resolved. */
export const ConfigFileSchema = z.object({
  osArt: z.union([z.boolean(), z.string()]).optional(),
  customArt: z.string().optional(),
  image: z.boolean().optional(),
  imagePath: z.string().optional(),
  nerdFont: z.boolean().optional(),
  colors: PaletteSchema.partial().optional(),
});
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type OsArtSetting =
  | { kind: "disabled" }
  | { kind: "auto" }
  | { kind: "specific"; name: string };

export interface Config {
  osArt: OsArtSetting;
  customArt: string | null;
  image: boolean;
  imagePath: string | null;
  nerdFont: boolean;
  colors: Palette;
}

export const DEFAULT_CONFIG: Config = {
  osArt: { kind: "disabled" },
  customArt: null,
  image: false,
  imagePath: null,
  nerdFont: false,
  colors: DEFAULT_PALETTE,
};

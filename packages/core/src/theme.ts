import type { ThemePreference } from "@skiff/schema";

export type ThemeMode = "light" | "dark";

export type Palette = {
  window: string;
  chrome: string;
  border: string;
  field: string;
  fieldFocus: string;
  text: string;
  mutedText: string;
  hover: string;
  pressed: string;
  tab: string;
  tabHover: string;
  button: string;
  buttonBorder: string;
  buttonText: string;
  accent: string;
  danger: string;
  dangerHover: string;
};

export const PALETTES: Record<ThemeMode, Palette> = {
  dark: {
    window: "#1e1e1e",
    chrome: "#2d2d2d",
    border: "#3d3d3d",
    field: "#1e1e1e",
    fieldFocus: "#2d2d2d",
    text: "#ffffff",
    mutedText: "#b0b0b0",
    hover: "#3d3d3d",
    pressed: "#4d4d4d",
    tab: "#2d2d2d",
    tabHover: "#3d3d3d",
    button: "#3d3d3d",
    buttonBorder: "#4d4d4d",
    buttonText: "#ffffff",
    accent: "#4a90e2",
    danger: "#d32f2f",
    dangerHover: "#f44336"
  },
  light: {
    window: "#f5f5f5",
    chrome: "#ffffff",
    border: "#e0e0e0",
    field: "#f8f8f8",
    fieldFocus: "#ffffff",
    text: "#000000",
    mutedText: "#555555",
    hover: "#e8e8e8",
    pressed: "#d0d0d0",
    tab: "#e8e8e8",
    tabHover: "#d8d8d8",
    button: "#f0f0f0",
    buttonBorder: "#d0d0d0",
    buttonText: "#555555",
    accent: "#4a90e2",
    danger: "#d32f2f",
    dangerHover: "#f44336"
  }
};

/** HSL lightness on a 0..255 scale; `#rgb` and `#rrggbb` accepted. */
export function colorLightness(hex: string): number | null {
  const m = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(hex.trim());
  if (!m) return null;
  const digits = m[1].length === 3 ? [...m[1]].map((c) => c + c).join("") : m[1];
  const r = parseInt(digits.slice(0, 2), 16);
  const g = parseInt(digits.slice(2, 4), 16);
  const b = parseInt(digits.slice(4, 6), 16);
  return Math.floor((Math.max(r, g, b) + Math.min(r, g, b)) / 2);
}

export function isDarkColor(hex: string): boolean {
  const lightness = colorLightness(hex);
  return lightness !== null && lightness < 128;
}

export function resolveThemeMode(pref: ThemePreference, systemPrefersDark: boolean): ThemeMode {
  if (pref === "system") return systemPrefersDark ? "dark" : "light";
  return pref;
}

export function toggleThemeMode(mode: ThemeMode): ThemeMode {
  return mode === "dark" ? "light" : "dark";
}

export function themeStylesheet(mode: ThemeMode): string {
  const p = PALETTES[mode];
  return `.skiff-window { background-color: ${p.window}; color: ${p.text}; }
.skiff-toolbar { background-color: ${p.chrome}; border-bottom: 1px solid ${p.border}; padding: 3px; gap: 3px; }
.skiff-toolbar .tool-button { background-color: transparent; border: none; border-radius: 3px; padding: 3px 6px; font-size: 13px; color: ${p.text}; }
.skiff-toolbar .tool-button:hover { background-color: ${p.hover}; }
.skiff-toolbar .tool-button:active { background-color: ${p.pressed}; }
.skiff-address { border: 1px solid ${p.border}; border-radius: 12px; padding: 4px 10px; background-color: ${p.field}; font-size: 12px; color: ${p.text}; }
.skiff-address:focus { border: 1px solid ${p.accent}; background-color: ${p.fieldFocus}; outline: none; }
.skiff-round-button { background-color: ${p.button}; border: 1px solid ${p.buttonBorder}; border-radius: 12px; font-size: 14px; font-weight: bold; color: ${p.buttonText}; width: 24px; height: 24px; }
.skiff-round-button:hover { background-color: ${p.pressed}; }
.skiff-tabbar { background-color: ${p.chrome}; }
.skiff-tab { background-color: ${p.tab}; border: none; border-top-left-radius: 4px; border-top-right-radius: 4px; padding: 5px 10px; margin-right: 2px; min-width: 80px; max-width: 180px; color: ${p.mutedText}; font-size: 12px; }
.skiff-tab.selected { background-color: ${p.window}; border-bottom: 2px solid ${p.accent}; color: ${p.text}; }
.skiff-tab:hover:not(.selected) { background-color: ${p.tabHover}; color: ${p.text}; }
.skiff-tab .close-button { background-color: ${p.danger}; border: none; border-radius: 2px; padding: 2px; width: 12px; height: 12px; }
.skiff-tab .close-button:hover { background-color: ${p.dangerHover}; }
.skiff-menu { background-color: ${p.chrome}; border: 1px solid ${p.border}; border-radius: 4px; padding: 3px; color: ${p.text}; }
.skiff-menu .menu-item { padding: 4px 20px; border-radius: 3px; }
.skiff-menu .menu-item:hover { background-color: ${p.accent}; color: #ffffff; }
`;
}

export type ShortcutCommand =
  | "tab.new"
  | "tab.close"
  | "tab.next"
  | "tab.previous"
  | "address.focus"
  | "page.reload"
  | "page.back"
  | "page.forward"
  | "bookmark.add";

export type KeyChord = {
  key: string;
  ctrlKey?: boolean;
  metaKey?: boolean;
  shiftKey?: boolean;
  altKey?: boolean;
};

type Binding = {
  command: ShortcutCommand;
  key: string;
  ctrl?: boolean;
  shift?: boolean;
  alt?: boolean;
  label: string;
};

// Cmd stands in for Ctrl on macOS.
export const SHORTCUTS: readonly Binding[] = [
  { command: "tab.new", key: "t", ctrl: true, label: "Ctrl+T" },
  { command: "tab.close", key: "w", ctrl: true, label: "Ctrl+W" },
  { command: "address.focus", key: "l", ctrl: true, label: "Ctrl+L" },
  { command: "tab.previous", key: "tab", ctrl: true, shift: true, label: "Ctrl+Shift+Tab" },
  { command: "tab.next", key: "tab", ctrl: true, label: "Ctrl+Tab" },
  { command: "page.reload", key: "r", ctrl: true, label: "Ctrl+R" },
  { command: "page.back", key: "arrowleft", alt: true, label: "Alt+Left" },
  { command: "page.forward", key: "arrowright", alt: true, label: "Alt+Right" },
  { command: "bookmark.add", key: "d", ctrl: true, label: "Ctrl+D" }
];

export function matchShortcut(chord: KeyChord): ShortcutCommand | null {
  const key = chord.key.toLowerCase();
  const ctrl = Boolean(chord.ctrlKey || chord.metaKey);
  const shift = Boolean(chord.shiftKey);
  const alt = Boolean(chord.altKey);
  for (const b of SHORTCUTS) {
    if (b.key !== key) continue;
    if (Boolean(b.ctrl) !== ctrl || Boolean(b.shift) !== shift || Boolean(b.alt) !== alt) continue;
    return b.command;
  }
  return null;
}

export function shortcutLabel(command: ShortcutCommand): string | null {
  return SHORTCUTS.find((b) => b.command === command)?.label ?? null;
}

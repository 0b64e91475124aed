import React, { useState } from "react";
import {
  MENU_GROUP_LABELS,
  MENU_GROUP_ORDER,
  type MenuCommand,
  type MenuEntry,
  type MenuGroupId
} from "../state/actionRegistry";

function MenuList(props: { entries: MenuEntry[]; onCommand: (command: MenuCommand) => void }) {
  const [openSub, setOpenSub] = useState<string | null>(null);
  return (
    <div className="skiff-menu" role="menu" style={{ minWidth: 200 }}>
      {props.entries.map((entry) => {
        if (entry.kind === "separator") {
          return <hr key={entry.id} role="separator" style={{ border: "none", borderTop: "1px solid", opacity: 0.2 }} />;
        }
        if (entry.kind === "submenu") {
          const open = openSub === entry.id;
          return (
            <div key={entry.id}>
              <div
                role="menuitem"
                aria-haspopup="menu"
                aria-expanded={open}
                className="menu-item"
                data-testid={entry.testId}
                onClick={() => setOpenSub(open ? null : entry.id)}
              >
                {entry.label} ▸
              </div>
              {open ? (
                <div style={{ paddingLeft: 12 }}>
                  <MenuList entries={entry.entries} onCommand={props.onCommand} />
                </div>
              ) : null}
            </div>
          );
        }
        return (
          <div
            key={entry.id}
            role="menuitem"
            className="menu-item"
            data-testid={entry.testId}
            title={entry.label}
            onClick={() => props.onCommand(entry.command)}
            style={{ display: "flex", justifyContent: "space-between", gap: 16 }}
          >
            <span style={{ overflow: "hidden", textOverflow: "ellipsis", whiteSpace: "nowrap", maxWidth: 360 }}>
              {entry.label}
            </span>
            {entry.shortcut ? <span style={{ opacity: 0.6 }}>{entry.shortcut}</span> : null}
          </div>
        );
      })}
    </div>
  );
}

export function MenuBar(props: {
  menus: Record<MenuGroupId, MenuEntry[]>;
  onCommand: (command: MenuCommand) => void;
}) {
  const [open, setOpen] = useState<MenuGroupId | null>(null);

  return (
    <div data-testid="menu-bar" style={{ display: "flex", gap: 4, padding: "2px 6px", position: "relative" }}>
      {MENU_GROUP_ORDER.map((group) => (
        <div key={group} style={{ position: "relative" }}>
          <button
            className="tool-button"
            data-testid={`menu-group-${group}`}
            aria-expanded={open === group}
            onClick={() => setOpen(open === group ? null : group)}
          >
            {MENU_GROUP_LABELS[group]}
          </button>
          {open === group ? (
            <div style={{ position: "absolute", top: "100%", left: 0, zIndex: 10 }}>
              <MenuList
                entries={props.menus[group]}
                onCommand={(command) => {
                  setOpen(null);
                  props.onCommand(command);
                }}
              />
            </div>
          ) : null}
        </div>
      ))}
    </div>
  );
}

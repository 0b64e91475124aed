import React, { useState } from "react";
import { CREATE_FOLDER_CHOICE, DEFAULT_BOOKMARK_FOLDER, folderChoices } from "@skiff/core";

/**
 * Asks which folder a bookmark goes in. With no folders yet it asks for a
 * name straight away; otherwise it offers the existing folders plus a way to
 * name a new one.
 */
export function FolderPrompt(props: {
  folders: string[];
  onConfirm: (folder: string) => void;
  onCancel: () => void;
}) {
  const choices = folderChoices(props.folders);
  const [choice, setChoice] = useState(choices[0] ?? CREATE_FOLDER_CHOICE);
  const [name, setName] = useState(choices.length === 0 ? DEFAULT_BOOKMARK_FOLDER : "");
  const naming = choice === CREATE_FOLDER_CHOICE;

  function confirm() {
    const folder = naming ? name.trim() : choice;
    if (!folder) {
      props.onCancel();
      return;
    }
    props.onConfirm(folder);
  }

  return (
    <div
      role="dialog"
      aria-label={naming && choices.length === 0 ? "New Folder" : "Choose Bookmark Folder"}
      data-testid="folder-prompt"
      className="skiff-menu"
      style={{ position: "absolute", top: 64, right: 16, zIndex: 20, padding: 12, width: 280 }}
    >
      {choices.length > 0 ? (
        <label style={{ display: "block", marginBottom: 8 }}>
          Select a folder:
          <select
            data-testid="folder-select"
            value={choice}
            onChange={(e) => setChoice(e.target.value)}
            style={{ display: "block", width: "100%", marginTop: 4 }}
          >
            {choices.map((c) => (
              <option key={c} value={c}>
                {c}
              </option>
            ))}
          </select>
        </label>
      ) : null}
      {naming ? (
        <label style={{ display: "block", marginBottom: 8 }}>
          Folder name:
          <input
            data-testid="folder-name"
            className="skiff-address"
            value={name}
            autoFocus
            onChange={(e) => setName(e.target.value)}
            onKeyDown={(e) => {
              if (e.key === "Enter") confirm();
              if (e.key === "Escape") props.onCancel();
            }}
            style={{ display: "block", width: "100%", marginTop: 4 }}
          />
        </label>
      ) : null}
      <div style={{ display: "flex", justifyContent: "flex-end", gap: 8 }}>
        <button data-testid="folder-cancel" onClick={props.onCancel}>
          Cancel
        </button>
        <button data-testid="folder-ok" onClick={confirm}>
          OK
        </button>
      </div>
    </div>
  );
}

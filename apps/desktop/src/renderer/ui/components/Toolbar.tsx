import React, { useEffect, useState, type RefObject } from "react";

export function Toolbar(props: {
  url: string;
  canGoBack: boolean;
  canGoForward: boolean;
  themeMode: "light" | "dark";
  addressRef: RefObject<HTMLInputElement>;
  onBack: () => void;
  onForward: () => void;
  onReload: () => void;
  onSubmit: (text: string) => string | null;
  onNewTab: () => void;
  onBookmark: () => void;
  onToggleTheme: () => void;
}) {
  // Null while the field shows the tab's URL; typed text until it is submitted.
  const [draft, setDraft] = useState<string | null>(null);
  const shown = draft ?? props.url;

  useEffect(() => {
    setDraft(null);
  }, [props.url]);

  return (
    <div className="skiff-toolbar" data-testid="toolbar" style={{ display: "flex", alignItems: "center" }}>
      <button className="tool-button" title="Back" data-testid="nav-back" disabled={!props.canGoBack} onClick={props.onBack}>
        ←
      </button>
      <button
        className="tool-button"
        title="Forward"
        data-testid="nav-forward"
        disabled={!props.canGoForward}
        onClick={props.onForward}
      >
        →
      </button>
      <button className="tool-button" title="Reload" data-testid="nav-reload" onClick={props.onReload}>
        ⟳
      </button>
      <form
        style={{ flex: 1, display: "flex" }}
        onSubmit={(e) => {
          e.preventDefault();
          if (props.onSubmit(shown)) setDraft(null);
        }}
      >
        <input
          ref={props.addressRef}
          className="skiff-address"
          data-testid="address-bar"
          aria-label="Address"
          placeholder="Search or enter URL..."
          value={shown}
          onChange={(e) => setDraft(e.target.value)}
          onFocus={(e) => e.target.select()}
          style={{ flex: 1 }}
        />
      </form>
      <button className="skiff-round-button" title="New Tab (Ctrl+T)" data-testid="new-tab" onClick={props.onNewTab}>
        +
      </button>
      <button className="tool-button" title="Add Bookmark" data-testid="add-bookmark" onClick={props.onBookmark}>
        ⭐
      </button>
      <button
        className="tool-button"
        title={props.themeMode === "dark" ? "Light Mode" : "Dark Mode"}
        data-testid="toggle-theme"
        onClick={props.onToggleTheme}
      >
        {props.themeMode === "dark" ? "☀" : "☾"}
      </button>
    </div>
  );
}

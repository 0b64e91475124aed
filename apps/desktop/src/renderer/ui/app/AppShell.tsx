import React, { useEffect, useMemo, useRef, useState } from "react";
import { canGoBack, canGoForward, matchShortcut, themeStylesheet, type ShortcutCommand } from "@skiff/core";
import { useBrowser } from "../state/browser";
import {
  bookmarksMenu,
  fileMenu,
  historyMenu,
  viewMenu,
  type MenuCommand,
  type MenuEntry,
  type MenuGroupId
} from "../state/actionRegistry";
import { FolderPrompt } from "../components/FolderPrompt";
import { MenuBar } from "../components/MenuBar";
import { PageHost, type EngineEvents } from "../components/PageHost";
import { TabBar } from "../components/TabBar";
import { Toolbar } from "../components/Toolbar";

export function AppShell() {
  const browser = useBrowser();
  const { tabs, current, dispatch } = browser;
  const addressRef = useRef<HTMLInputElement>(null);
  const [promptOpen, setPromptOpen] = useState(false);

  const menus = useMemo<Record<MenuGroupId, MenuEntry[]>>(
    () => ({
      file: fileMenu(),
      bookmarks: bookmarksMenu(browser.folders),
      history: historyMenu(current?.visited ?? []),
      view: viewMenu(browser.themeMode)
    }),
    [browser.folders, current?.visited, browser.themeMode]
  );

  const events = useMemo<EngineEvents>(
    () => ({
      onUrlChanged: (id, url) => dispatch({ type: "engine.urlChanged", id, url }),
      onTitleChanged: (id, title) => dispatch({ type: "engine.titleChanged", id, title }),
      onLoadStarted: (id) => dispatch({ type: "engine.loadStarted", id }),
      onLoadFinished: (id) => dispatch({ type: "engine.loadFinished", id })
    }),
    [dispatch]
  );

  function runMenuCommand(command: MenuCommand) {
    switch (command.type) {
      case "tab.new":
        browser.openTab();
        return;
      case "tab.close":
        if (current) browser.closeTab(current.id);
        return;
      case "bookmark.add":
        if (current) setPromptOpen(true);
        return;
      case "bookmark.open":
      case "history.open":
        browser.loadInActiveTab(command.url);
        return;
      case "bookmark.remove":
        void browser.removeBookmark(command.folder, command.url);
        return;
      case "history.clear":
        void browser.clearHistory();
        return;
      case "theme.toggle":
        void browser.toggleTheme();
        return;
    }
  }

  function runShortcut(command: ShortcutCommand) {
    switch (command) {
      case "tab.new":
        browser.openTab();
        break;
      case "tab.close":
        if (current) browser.closeTab(current.id);
        break;
      case "tab.next":
        dispatch({ type: "tab.activateNext" });
        break;
      case "tab.previous":
        dispatch({ type: "tab.activatePrevious" });
        break;
      case "address.focus":
        addressRef.current?.focus();
        break;
      case "page.reload":
        if (current) dispatch({ type: "tab.reload", id: current.id });
        break;
      case "page.back":
        if (current) dispatch({ type: "tab.back", id: current.id });
        break;
      case "page.forward":
        if (current) dispatch({ type: "tab.forward", id: current.id });
        break;
      case "bookmark.add":
        if (current) setPromptOpen(true);
        break;
    }
  }

  // Re-bound each render so the handler sees the current tab.
  const shortcutRef = useRef(runShortcut);
  shortcutRef.current = runShortcut;
  useEffect(() => {
    function onKeyDown(e: KeyboardEvent) {
      const command = matchShortcut(e);
      if (!command) return;
      e.preventDefault();
      shortcutRef.current(command);
    }
    window.addEventListener("keydown", onKeyDown);
    return () => window.removeEventListener("keydown", onKeyDown);
  }, []);

  return (
    <div
      data-testid="app-shell"
      data-theme={browser.themeMode}
      className="skiff-window"
      style={{ height: "100vh", display: "flex", flexDirection: "column", position: "relative" }}
    >
      <style data-testid="theme-style">{themeStylesheet(browser.themeMode)}</style>
      <MenuBar menus={menus} onCommand={runMenuCommand} />
      <Toolbar
        key={current?.id ?? "none"}
        url={current?.url ?? ""}
        canGoBack={current ? canGoBack(current) : false}
        canGoForward={current ? canGoForward(current) : false}
        themeMode={browser.themeMode}
        addressRef={addressRef}
        onBack={() => current && dispatch({ type: "tab.back", id: current.id })}
        onForward={() => current && dispatch({ type: "tab.forward", id: current.id })}
        onReload={() => current && dispatch({ type: "tab.reload", id: current.id })}
        onSubmit={browser.submitAddress}
        onNewTab={() => browser.openTab()}
        onBookmark={() => current && setPromptOpen(true)}
        onToggleTheme={() => void browser.toggleTheme()}
      />
      {browser.error ? (
        <div
          data-testid="error-banner"
          role="alert"
          style={{ padding: "4px 10px", color: "#b00020", display: "flex", gap: 8 }}
        >
          <span style={{ flex: 1 }}>{browser.error}</span>
          <button onClick={() => browser.setError(null)}>Dismiss</button>
        </div>
      ) : null}
      <TabBar
        tabs={tabs.tabs}
        activeId={tabs.activeId}
        onActivate={(id) => dispatch({ type: "tab.activate", id })}
        onClose={browser.closeTab}
        onMove={(id, toIndex) => dispatch({ type: "tab.move", id, toIndex })}
      />
      <PageHost tabs={tabs.tabs} activeId={tabs.activeId} events={events} />
      {promptOpen ? (
        <FolderPrompt
          folders={browser.folders.map((f) => f.name)}
          onCancel={() => setPromptOpen(false)}
          onConfirm={(folder) => {
            setPromptOpen(false);
            void browser.addBookmark(folder);
          }}
        />
      ) : null}
    </div>
  );
}

import { useCallback, useEffect, useMemo, useReducer, useRef, useState } from "react";
import {
  BookmarksAddResultSchema,
  BookmarksListResultSchema,
  BookmarksRemoveResultSchema,
  HistoryClearResultSchema,
  HistoryGetResultSchema,
  HistorySaveResultSchema,
  PrefsGetResultSchema,
  PrefsSchema,
  PrefsUpdateResultSchema,
  type BookmarkFolder,
  type Prefs,
  type PrefsPatch
} from "@skiff/schema";
import {
  activeTab,
  collectHistory,
  createTabsState,
  errorMessage,
  NEW_TAB_TITLE,
  reduceTabs,
  resolveAddressInput,
  resolveThemeMode,
  toggleThemeMode,
  type ThemeMode
} from "@skiff/core";
import { requestParsed } from "./bridge";

function systemPrefersDark(): boolean {
  if (typeof window.matchMedia !== "function") return false;
  return window.matchMedia("(prefers-color-scheme: dark)").matches;
}

/**
 * Browser window state: tabs, bookmarks, preferences and the store round
 * trips that persist them.
 */
export function useBrowser() {
  const [tabs, dispatch] = useReducer(reduceTabs, undefined, createTabsState);
  const [prefs, setPrefs] = useState<Prefs>(() => PrefsSchema.parse({}));
  const [folders, setFolders] = useState<BookmarkFolder[]>([]);
  const [ready, setReady] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [systemDark] = useState(systemPrefersDark);

  const current = activeTab(tabs);
  const themeMode: ThemeMode = resolveThemeMode(prefs.theme, systemDark);

  useEffect(() => {
    let cancelled = false;
    async function boot() {
      let loaded = PrefsSchema.parse({});
      let history: string[] = [];
      try {
        const [p, b, h] = await Promise.all([
          requestParsed("prefs.get", {}, PrefsGetResultSchema),
          requestParsed("bookmarks.list", {}, BookmarksListResultSchema),
          requestParsed("history.get", {}, HistoryGetResultSchema)
        ]);
        loaded = p.prefs;
        history = h.urls;
        if (!cancelled) setFolders(b.folders);
      } catch (e: unknown) {
        if (!cancelled) setError(errorMessage(e));
      }
      if (cancelled) return;
      setPrefs(loaded);
      dispatch({ type: "tab.open", url: loaded.homeUrl });
      if (history.length > 0) dispatch({ type: "history.seed", urls: history });
      setReady(true);
    }
    void boot();
    return () => {
      cancelled = true;
    };
  }, []);

  // Persist the combined history whenever any tab records a new visit.
  const historyText = useMemo(() => collectHistory(tabs).join("\n"), [tabs]);
  const savedHistory = useRef<string | null>(null);
  useEffect(() => {
    if (!ready || savedHistory.current === historyText) return;
    savedHistory.current = historyText;
    const urls = historyText ? historyText.split("\n") : [];
    requestParsed("history.save", { urls }, HistorySaveResultSchema).catch((e: unknown) =>
      setError(errorMessage(e))
    );
  }, [ready, historyText]);

  const openTab = useCallback(
    (url?: string) => dispatch({ type: "tab.open", url: url ?? prefs.homeUrl }),
    [prefs.homeUrl]
  );

  const closeTab = useCallback((id: string) => dispatch({ type: "tab.close", id }), []);

  /** Loads typed text in the active tab; returns the resolved URL, if any. */
  function submitAddress(text: string): string | null {
    if (!current) return null;
    const url = resolveAddressInput(text, { searchEngine: prefs.searchEngine });
    if (!url) return null;
    dispatch({ type: "tab.navigate", id: current.id, url });
    return url;
  }

  function loadInActiveTab(url: string) {
    if (!current) return;
    dispatch({ type: "tab.navigate", id: current.id, url });
  }

  async function addBookmark(folder: string) {
    if (!current) return;
    setError(null);
    try {
      const res = await requestParsed(
        "bookmarks.add",
        { folder, title: current.title === NEW_TAB_TITLE ? current.url : current.title, url: current.url },
        BookmarksAddResultSchema
      );
      setFolders(res.folders);
    } catch (e: unknown) {
      setError(errorMessage(e));
    }
  }

  async function removeBookmark(folder: string, url: string) {
    setError(null);
    try {
      const res = await requestParsed("bookmarks.remove", { folder, url }, BookmarksRemoveResultSchema);
      setFolders(res.folders);
    } catch (e: unknown) {
      setError(errorMessage(e));
    }
  }

  async function clearHistory() {
    setError(null);
    dispatch({ type: "history.clear" });
    try {
      await requestParsed("history.clear", {}, HistoryClearResultSchema);
    } catch (e: unknown) {
      setError(errorMessage(e));
    }
  }

  async function updatePrefs(patch: PrefsPatch) {
    setError(null);
    setPrefs((p) => ({ ...p, ...patch }));
    try {
      const res = await requestParsed("prefs.update", { ...patch }, PrefsUpdateResultSchema);
      setPrefs(res.prefs);
    } catch (e: unknown) {
      setError(errorMessage(e));
    }
  }

  function toggleTheme() {
    return updatePrefs({ theme: toggleThemeMode(themeMode) });
  }

  return {
    ready,
    error,
    setError,
    tabs,
    current,
    dispatch,
    prefs,
    folders,
    themeMode,
    openTab,
    closeTab,
    submitAddress,
    loadInActiveTab,
    addBookmark,
    removeBookmark,
    clearHistory,
    toggleTheme
  };
}

export type BrowserController = ReturnType<typeof useBrowser>;

import { recordVisit, recordVisits } from "./history";

export const NEW_TAB_TITLE = "New Tab";
export const TAB_LABEL_MAX = 20;

export type NavigationStack = {
  entries: string[];
  index: number;
};

export type Tab = {
  id: string;
  title: string;
  url: string;
  loading: boolean;
  // Bumped on every reload request so the page host can re-issue the load.
  reloadToken: number;
  nav: NavigationStack;
  visited: string[];
};

export type TabsState = {
  tabs: Tab[];
  activeId: string | null;
  nextId: number;
};

export type TabsAction =
  | { type: "tab.open"; url: string }
  | { type: "tab.close"; id: string }
  | { type: "tab.activate"; id: string }
  | { type: "tab.activateNext" }
  | { type: "tab.activatePrevious" }
  | { type: "tab.move"; id: string; toIndex: number }
  | { type: "tab.navigate"; id: string; url: string }
  | { type: "tab.back"; id: string }
  | { type: "tab.forward"; id: string }
  | { type: "tab.reload"; id: string }
  | { type: "engine.urlChanged"; id: string; url: string }
  | { type: "engine.titleChanged"; id: string; title: string }
  | { type: "engine.loadStarted"; id: string }
  | { type: "engine.loadFinished"; id: string }
  | { type: "history.seed"; urls: string[] }
  | { type: "history.clear" };

export function createTabsState(): TabsState {
  return { tabs: [], activeId: null, nextId: 1 };
}

export function activeTab(state: TabsState): Tab | null {
  return state.tabs.find((t) => t.id === state.activeId) ?? null;
}

export function tabLabel(title: string): string {
  const text = title.trim() || NEW_TAB_TITLE;
  if (text.length > TAB_LABEL_MAX) return `${text.slice(0, TAB_LABEL_MAX - 3)}...`;
  return text;
}

export function canGoBack(tab: Tab): boolean {
  return tab.nav.index > 0;
}

export function canGoForward(tab: Tab): boolean {
  return tab.nav.index < tab.nav.entries.length - 1;
}

/** Every open tab's visited list, in tab order, as one list. */
export function collectHistory(state: TabsState): string[] {
  return state.tabs.flatMap((t) => t.visited);
}

function pushEntry(nav: NavigationStack, url: string): NavigationStack {
  const entries = [...nav.entries.slice(0, nav.index + 1), url];
  return { entries, index: entries.length - 1 };
}

function updateTab(state: TabsState, id: string, fn: (tab: Tab) => Tab): TabsState {
  let changed = false;
  const tabs = state.tabs.map((t) => {
    if (t.id !== id) return t;
    changed = true;
    return fn(t);
  });
  return changed ? { ...state, tabs } : state;
}

function stepActive(state: TabsState, delta: number): TabsState {
  const count = state.tabs.length;
  if (count === 0) return state;
  const current = state.tabs.findIndex((t) => t.id === state.activeId);
  const next = (((current + delta) % count) + count) % count;
  return { ...state, activeId: state.tabs[next].id };
}

function goTo(tab: Tab, index: number): Tab {
  if (index < 0 || index >= tab.nav.entries.length || index === tab.nav.index) return tab;
  return {
    ...tab,
    url: tab.nav.entries[index],
    loading: true,
    nav: { entries: tab.nav.entries, index }
  };
}

export function reduceTabs(state: TabsState, action: TabsAction): TabsState {
  switch (action.type) {
    case "tab.open": {
      const id = `tab-${state.nextId}`;
      const tab: Tab = {
        id,
        title: NEW_TAB_TITLE,
        url: action.url,
        loading: true,
        reloadToken: 0,
        nav: { entries: [action.url], index: 0 },
        visited: recordVisit([], action.url)
      };
      return { tabs: [...state.tabs, tab], activeId: id, nextId: state.nextId + 1 };
    }
    case "tab.close": {
      // The window always keeps one tab.
      if (state.tabs.length <= 1) return state;
      const index = state.tabs.findIndex((t) => t.id === action.id);
      if (index === -1) return state;
      const tabs = state.tabs.filter((t) => t.id !== action.id);
      let activeId = state.activeId;
      if (activeId === action.id) {
        activeId = (tabs[index] ?? tabs[index - 1]).id;
      }
      return { ...state, tabs, activeId };
    }
    case "tab.activate":
      if (!state.tabs.some((t) => t.id === action.id)) return state;
      return { ...state, activeId: action.id };
    case "tab.activateNext":
      return stepActive(state, 1);
    case "tab.activatePrevious":
      return stepActive(state, -1);
    case "tab.move": {
      const from = state.tabs.findIndex((t) => t.id === action.id);
      if (from === -1) return state;
      const to = Math.max(0, Math.min(action.toIndex, state.tabs.length - 1));
      if (to === from) return state;
      const tabs = [...state.tabs];
      const [moved] = tabs.splice(from, 1);
      tabs.splice(to, 0, moved);
      return { ...state, tabs };
    }
    case "tab.navigate":
      return updateTab(state, action.id, (t) => ({
        ...t,
        url: action.url,
        loading: true,
        nav: pushEntry(t.nav, action.url),
        visited: recordVisit(t.visited, action.url)
      }));
    case "tab.back":
      return updateTab(state, action.id, (t) => goTo(t, t.nav.index - 1));
    case "tab.forward":
      return updateTab(state, action.id, (t) => goTo(t, t.nav.index + 1));
    case "tab.reload":
      return updateTab(state, action.id, (t) => ({
        ...t,
        loading: true,
        reloadToken: t.reloadToken + 1
      }));
    case "engine.urlChanged":
      return updateTab(state, action.id, (t) => {
        const current = t.nav.entries[t.nav.index];
        return {
          ...t,
          url: action.url,
          nav: current === action.url ? t.nav : pushEntry(t.nav, action.url),
          visited: recordVisit(t.visited, action.url)
        };
      });
    case "engine.titleChanged":
      return updateTab(state, action.id, (t) => ({
        ...t,
        title: action.title.trim() || NEW_TAB_TITLE
      }));
    case "engine.loadStarted":
      return updateTab(state, action.id, (t) => ({ ...t, loading: true }));
    case "engine.loadFinished":
      return updateTab(state, action.id, (t) => ({ ...t, loading: false }));
    case "history.seed": {
      const first = state.tabs[0];
      if (!first) return state;
      return updateTab(state, first.id, (t) => ({ ...t, visited: recordVisits(t.visited, action.urls) }));
    }
    case "history.clear":
      return { ...state, tabs: state.tabs.map((t) => ({ ...t, visited: [] })) };
  }
}

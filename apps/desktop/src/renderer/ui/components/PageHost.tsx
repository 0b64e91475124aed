import React, { useEffect, useRef } from "react";
import type { Tab } from "@skiff/core";

/** What the window chrome hears back from an engine view. */
export type EngineEvents = {
  onUrlChanged: (tabId: string, url: string) => void;
  onTitleChanged: (tabId: string, title: string) => void;
  onLoadStarted: (tabId: string) => void;
  onLoadFinished: (tabId: string) => void;
};

function readFrame(frame: HTMLIFrameElement): { url: string | null; title: string | null } {
  try {
    const url = frame.contentWindow?.location.href ?? null;
    const title = frame.contentDocument?.title ?? null;
    return { url: url === "about:blank" ? null : url, title };
  } catch {
    // Cross-origin documents are opaque to the embedder.
    return { url: null, title: null };
  }
}

function EngineView(props: { tab: Tab; active: boolean; events: EngineEvents }) {
  const { tab, active, events } = props;
  const frameRef = useRef<HTMLIFrameElement | null>(null);
  const lastReload = useRef(tab.reloadToken);

  useEffect(() => {
    events.onLoadStarted(tab.id);
  }, [events, tab.id, tab.url, tab.reloadToken]);

  useEffect(() => {
    const frame = frameRef.current;
    if (!frame || lastReload.current === tab.reloadToken) return;
    lastReload.current = tab.reloadToken;
    frame.src = tab.url;
  }, [tab.reloadToken, tab.url]);

  return (
    <iframe
      ref={frameRef}
      data-testid={`engine-view-${tab.id}`}
      title={tab.title}
      src={tab.url}
      sandbox="allow-forms allow-modals allow-popups allow-same-origin allow-scripts allow-downloads"
      onLoad={() => {
        const frame = frameRef.current;
        if (!frame) return;
        const seen = readFrame(frame);
        if (seen.url && seen.url !== tab.url) events.onUrlChanged(tab.id, seen.url);
        if (seen.title) events.onTitleChanged(tab.id, seen.title);
        events.onLoadFinished(tab.id);
      }}
      style={{
        border: "none",
        width: "100%",
        height: "100%",
        display: active ? "block" : "none"
      }}
    />
  );
}

/** One engine view per tab; only the active tab's view is shown. */
export function PageHost(props: { tabs: Tab[]; activeId: string | null; events: EngineEvents }) {
  return (
    <div data-testid="page-host" style={{ flex: 1, minHeight: 0, position: "relative" }}>
      {props.tabs.map((tab) => (
        <EngineView key={tab.id} tab={tab} active={tab.id === props.activeId} events={props.events} />
      ))}
    </div>
  );
}

import React, { useState } from "react";
import { tabLabel, type Tab } from "@skiff/core";

export function TabBar(props: {
  tabs: Tab[];
  activeId: string | null;
  onActivate: (id: string) => void;
  onClose: (id: string) => void;
  onMove: (id: string, toIndex: number) => void;
}) {
  const [dragId, setDragId] = useState<string | null>(null);

  return (
    <div className="skiff-tabbar" role="tablist" data-testid="tab-bar" style={{ display: "flex", paddingTop: 4 }}>
      {props.tabs.map((tab, index) => {
        const selected = tab.id === props.activeId;
        return (
          <div
            key={tab.id}
            role="tab"
            aria-selected={selected}
            className={selected ? "skiff-tab selected" : "skiff-tab"}
            data-testid={`tab-${tab.id}`}
            title={tab.title}
            draggable
            onDragStart={() => setDragId(tab.id)}
            onDragOver={(e) => e.preventDefault()}
            onDrop={() => {
              if (dragId && dragId !== tab.id) props.onMove(dragId, index);
              setDragId(null);
            }}
            onClick={() => props.onActivate(tab.id)}
            style={{ display: "flex", alignItems: "center", gap: 6, cursor: "default" }}
          >
            {tab.loading ? <span aria-hidden="true">…</span> : null}
            <span data-testid={`tab-label-${tab.id}`} style={{ overflow: "hidden", whiteSpace: "nowrap", flex: 1 }}>
              {tabLabel(tab.title)}
            </span>
            <button
              className="close-button"
              aria-label={`Close ${tabLabel(tab.title)}`}
              data-testid={`tab-close-${tab.id}`}
              onClick={(e) => {
                e.stopPropagation();
                props.onClose(tab.id);
              }}
            />
          </div>
        );
      })}
    </div>
  );
}

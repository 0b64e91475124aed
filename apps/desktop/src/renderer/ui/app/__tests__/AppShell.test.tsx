// @vitest-environment jsdom

import React from "react";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { cleanup, fireEvent, render, screen, waitFor } from "@testing-library/react";
import { DEFAULT_HOME_URL } from "@skiff/core";
import { AppShell } from "../AppShell";
import { resetBridgeForTests } from "../../state/bridge";

function submitAddress(text: string) {
  const input = screen.getByTestId("address-bar");
  if (!(input instanceof HTMLInputElement) || !input.form) throw new Error("address bar has no form");
  fireEvent.change(input, { target: { value: text } });
  fireEvent.submit(input.form);
}

function typeAddress(text: string) {
  fireEvent.change(screen.getByTestId("address-bar"), { target: { value: text } });
}

function addressValue(): string {
  const input = screen.getByTestId("address-bar");
  return input instanceof HTMLInputElement ? input.value : "";
}

beforeEach(() => {
  window.localStorage.clear();
  resetBridgeForTests();
});

afterEach(() => {
  cleanup();
});

describe("AppShell", () => {
  test("opens the home page in the first tab", async () => {
    render(<AppShell />);
    expect(await screen.findByTestId("tab-tab-1")).toBeTruthy();
    expect(addressValue()).toBe(DEFAULT_HOME_URL);
    expect(screen.getByTestId("engine-view-tab-1").getAttribute("src")).toBe(DEFAULT_HOME_URL);
    expect(screen.getByTestId("tab-label-tab-1").textContent).toBe("New Tab");
    await waitFor(() =>
      expect(window.localStorage.getItem("skiff:history.txt")).toBe("https://duckduckgo.com\n")
    );
  });

  test("searches from the address bar", async () => {
    render(<AppShell />);
    await screen.findByTestId("tab-tab-1");
    submitAddress("hello world");
    expect(addressValue()).toBe("https://duckduckgo.com/?q=hello+world");
    expect(screen.getByTestId("engine-view-tab-1").getAttribute("src")).toBe(
      "https://duckduckgo.com/?q=hello+world"
    );
    expect(screen.getByTestId("nav-back").hasAttribute("disabled")).toBe(false);
  });

  test("new tab button and close keep at least one tab", async () => {
    render(<AppShell />);
    await screen.findByTestId("tab-tab-1");
    fireEvent.click(screen.getByTestId("new-tab"));
    expect(screen.getByTestId("tab-tab-2").getAttribute("aria-selected")).toBe("true");

    fireEvent.click(screen.getByTestId("tab-close-tab-2"));
    expect(screen.queryByTestId("tab-tab-2")).toBeNull();
    fireEvent.click(screen.getByTestId("tab-close-tab-1"));
    expect(screen.getByTestId("tab-tab-1")).toBeTruthy();
  });

  test("ctrl+t opens a tab", async () => {
    render(<AppShell />);
    await screen.findByTestId("tab-tab-1");
    fireEvent.keyDown(window, { key: "t", ctrlKey: true });
    expect(screen.getByTestId("tab-tab-2")).toBeTruthy();
  });

  test("bookmarks the page into a new folder", async () => {
    render(<AppShell />);
    await screen.findByTestId("tab-tab-1");
    fireEvent.click(screen.getByTestId("add-bookmark"));
    const name = screen.getByTestId("folder-name");
    expect(name instanceof HTMLInputElement ? name.value : "").toBe("Bookmarks");
    fireEvent.click(screen.getByTestId("folder-ok"));
    await waitFor(() =>
      expect(window.localStorage.getItem("skiff:bookmarks.txt")).toBe(
        "Bookmarks|https://duckduckgo.com|https://duckduckgo.com\n"
      )
    );
    fireEvent.click(screen.getByTestId("menu-group-bookmarks"));
    expect(await screen.findByTestId("bookmark-folder-bookmarks")).toBeTruthy();
  });

  test("theme toggle switches and saves", async () => {
    render(<AppShell />);
    await screen.findByTestId("tab-tab-1");
    expect(screen.getByTestId("app-shell").getAttribute("data-theme")).toBe("light");
    fireEvent.click(screen.getByTestId("toggle-theme"));
    expect(screen.getByTestId("app-shell").getAttribute("data-theme")).toBe("dark");
    await waitFor(() => {
      const saved = JSON.parse(window.localStorage.getItem("skiff:prefs.json") ?? "{}");
      expect(saved.theme).toBe("dark");
    });
  });

  test("switching tabs shows the selected tab's address", async () => {
    render(<AppShell />);
    await screen.findByTestId("tab-tab-1");
    fireEvent.click(screen.getByTestId("new-tab"));
    typeAddress("half typed");
    expect(addressValue()).toBe("half typed");

    fireEvent.click(screen.getByTestId("tab-tab-1"));
    expect(screen.getByTestId("tab-tab-1").getAttribute("aria-selected")).toBe("true");
    expect(addressValue()).toBe(DEFAULT_HOME_URL);
    fireEvent.click(screen.getByTestId("tab-tab-2"));
    expect(addressValue()).toBe(DEFAULT_HOME_URL);
  });

  test("ctrl+tab cycles tabs and ctrl+w closes the active one", async () => {
    render(<AppShell />);
    await screen.findByTestId("tab-tab-1");
    fireEvent.keyDown(window, { key: "t", ctrlKey: true });
    expect(screen.getByTestId("tab-tab-2").getAttribute("aria-selected")).toBe("true");

    fireEvent.keyDown(window, { key: "Tab", ctrlKey: true });
    expect(screen.getByTestId("tab-tab-1").getAttribute("aria-selected")).toBe("true");

    fireEvent.keyDown(window, { key: "w", ctrlKey: true });
    expect(screen.queryByTestId("tab-tab-1")).toBeNull();
    expect(screen.getByTestId("tab-tab-2").getAttribute("aria-selected")).toBe("true");

    fireEvent.keyDown(window, { key: "w", ctrlKey: true });
    expect(screen.getByTestId("tab-tab-2")).toBeTruthy();
  });

  test("a history entry loads in the active tab", async () => {
    render(<AppShell />);
    await screen.findByTestId("tab-tab-1");
    submitAddress("example.test");
    expect(addressValue()).toBe("https://example.test");

    fireEvent.click(screen.getByTestId("menu-group-history"));
    expect(screen.getByTestId("history-entry-0").textContent).toBe("https://example.test");
    fireEvent.click(screen.getByTestId("history-entry-1"));
    expect(addressValue()).toBe(DEFAULT_HOME_URL);
    expect(screen.getByTestId("engine-view-tab-1").getAttribute("src")).toBe(DEFAULT_HOME_URL);
  });

  test("removing a folder's last bookmark rewrites the file and drops the folder", async () => {
    window.localStorage.setItem(
      "skiff:bookmarks.txt",
      "Work|Site|https://site.test\nNews|Daily|https://daily.test\n"
    );
    render(<AppShell />);
    await screen.findByTestId("tab-tab-1");
    fireEvent.click(screen.getByTestId("menu-group-bookmarks"));
    fireEvent.click(await screen.findByTestId("bookmark-folder-work"));
    fireEvent.click(screen.getByTestId("bookmark-remove-0-0"));
    await waitFor(() =>
      expect(window.localStorage.getItem("skiff:bookmarks.txt")).toBe("News|Daily|https://daily.test\n")
    );

    fireEvent.click(screen.getByTestId("menu-group-bookmarks"));
    await waitFor(() => expect(screen.queryByTestId("bookmark-folder-work")).toBeNull());
    expect(screen.getByTestId("bookmark-folder-news")).toBeTruthy();
  });
});

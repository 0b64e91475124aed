export * from "./omnibox";
export * from "./tabs";
export * from "./history";
export * from "./bookmarks";
export * from "./codec";
export * from "./theme";
export * from "./shortcuts";
export * from "./errors";
export * from "./profile";

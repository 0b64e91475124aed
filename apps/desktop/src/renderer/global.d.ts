export {};

declare global {
  interface Window {
    /** Present when a desktop host injects its store bridge. */
    skiff?: {
      request: (method: string, params?: Record<string, unknown>) => Promise<unknown>;
    };
  }
}

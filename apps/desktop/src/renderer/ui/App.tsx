import React from "react";
import { AppShell } from "./app/AppShell";

export function App() {
  return <AppShell />;
}

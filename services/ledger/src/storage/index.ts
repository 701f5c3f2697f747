export * from "./ledger-state-store.js";

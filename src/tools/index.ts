/**
 * Barrel file: exports all tool definitions for linesag.
 *
 * Each tool follows the pattern: createXxxToolDefinition(options) → ToolDefinition
 */
import type { WireCatalog } from "../line/wire.js";

// ─── Overhead line ──────────────────────────────────────────────────────────
import { createDipTensionToolDefinition } from "./line/dip-tension.js";
import { createWireLookupToolDefinition } from "./line/wire-lookup.js";

export { createDipTensionToolDefinition, createWireLookupToolDefinition };

export interface ToolOptions {
  /** Loaded once by the caller and shared by every tool. */
  catalog: WireCatalog;
}

// ─── Convenience: build all tools at once ───────────────────────────────────

export function createAllToolDefinitions(options: ToolOptions) {
  return [
    createDipTensionToolDefinition(options),
    createWireLookupToolDefinition(options),
  ];
}

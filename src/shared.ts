/**
 * Shared setup code for the CLI (entry.ts): environment, paths, auth and
 * model resolution, session helpers.
 */
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { fileURLToPath } from "node:url";
import {
  AuthStorage,
  ModelRegistry,
} from "@mariozechner/pi-coding-agent";
import type { Api, Model } from "@mariozechner/pi-ai";
import type { AgentMessage } from "@mariozechner/pi-agent-core";

// ─── .env loading ────────────────────────────────────────────────────────────

export function loadDotEnv() {
  try {
    const envPath = path.join(process.cwd(), ".env");
    const content = fs.readFileSync(envPath, "utf-8");
    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;
      const eqIdx = trimmed.indexOf("=");
      if (eqIdx === -1) continue;
      const key = trimmed.slice(0, eqIdx).trim();
      const value = trimmed.slice(eqIdx + 1).trim();
      if (key && !(key in process.env)) {
        process.env[key] = value;
      }
    }
  } catch {
    // No .env file
  }
}

// Load .env immediately so env vars are available for module-level constants
loadDotEnv();

// ─── Configuration ───────────────────────────────────────────────────────────

export const LINESAG_HOME = process.env.LINESAG_HOME ?? path.join(os.homedir(), ".linesag");
export const AGENT_ID = process.env.LINESAG_AGENT ?? "main";
export const AGENT_DIR = path.join(LINESAG_HOME, "agents", AGENT_ID, "agent");
export const MODELS_JSON = path.join(AGENT_DIR, "models.json");
export const AUTH_PROFILES_JSON = path.join(AGENT_DIR, "auth-profiles.json");
export const SESSION_DIR = path.join(LINESAG_HOME, "state", "sessions");

export const DEFAULT_PROVIDER = process.env.LINESAG_PROVIDER ?? "anthropic";
export const DEFAULT_MODEL = process.env.LINESAG_MODEL ?? "claude-sonnet-4-20250514";

/** Bundled catalog, found from either src/ or dist/src/. */
function defaultWireCatalogPath(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.resolve(here, "../config/wire-catalog.csv"),
    path.resolve(here, "../../config/wire-catalog.csv"),
  ];
  return candidates.find((p) => fs.existsSync(p)) ?? path.resolve(process.cwd(), "config/wire-catalog.csv");
}

export const WIRE_CATALOG_PATH = process.env.LINESAG_WIRE_CATALOG ?? defaultWireCatalogPath();

// ─── Ensure directories ─────────────────────────────────────────────────────

export function ensureDirs() {
  for (const dir of [LINESAG_HOME, AGENT_DIR, SESSION_DIR]) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

// ─── Auth ────────────────────────────────────────────────────────────────────

type AuthProfile = { type: string; provider: string; token?: string };
type AuthProfiles = {
  profiles?: Record<string, AuthProfile>;
  lastGood?: Record<string, string>;
};

function loadApiKeyFromProfiles(provider: string): string | undefined {
  let data: AuthProfiles;
  try {
    data = JSON.parse(fs.readFileSync(AUTH_PROFILES_JSON, "utf-8"));
  } catch {
    // File doesn't exist or can't be parsed
    return undefined;
  }

  const profiles = data.profiles ?? {};
  const lastGoodKey = data.lastGood?.[provider];
  const lastGood = lastGoodKey ? profiles[lastGoodKey] : undefined;
  if (lastGood?.token) {
    return lastGood.token;
  }

  for (const profile of Object.values(profiles)) {
    if (profile.provider === provider && profile.token) {
      return profile.token;
    }
  }
  return undefined;
}

export const ENV_KEY_MAP: Record<string, string[]> = {
  anthropic: ["ANTHROPIC_API_KEY"],
  openai: ["OPENAI_API_KEY"],
  google: ["GOOGLE_API_KEY", "GEMINI_API_KEY"],
  groq: ["GROQ_API_KEY"],
  xai: ["XAI_API_KEY"],
  mistral: ["MISTRAL_API_KEY"],
  openrouter: ["OPENROUTER_API_KEY"],
  cerebras: ["CEREBRAS_API_KEY"],
};

export function ensureApiKeyInEnv(provider: string): boolean {
  const envKeys = ENV_KEY_MAP[provider] ?? [`${provider.toUpperCase()}_API_KEY`];

  for (const envKey of envKeys) {
    if (process.env[envKey]) return true;
  }

  const apiKey = loadApiKeyFromProfiles(provider);
  if (apiKey && envKeys[0]) {
    process.env[envKeys[0]] = apiKey;
    return true;
  }

  return false;
}

// ─── Model resolution ────────────────────────────────────────────────────────

function resolveApiType(provider: string): string {
  const apiMap: Record<string, string> = {
    anthropic: "anthropic",
    openai: "openai-responses",
    google: "google",
    ollama: "ollama",
    groq: "openai",
    xai: "openai",
    mistral: "openai",
    openrouter: "openai",
    cerebras: "openai",
  };
  return apiMap[provider] ?? "openai";
}

export function resolveModelAndAuth(provider: string, modelId: string) {
  const authJsonPath = path.join(AGENT_DIR, "auth.json");
  const authStorage = new AuthStorage(authJsonPath);
  const modelRegistry = new ModelRegistry(authStorage, MODELS_JSON);

  let model = modelRegistry.find(provider, modelId) as Model<Api> | null;

  if (!model) {
    // Unknown to the registry: describe it well enough for the provider's API
    const apiType = resolveApiType(provider);
    model = {
      id: modelId,
      name: modelId,
      api: apiType,
      provider,
      input: ["text", "image"],
      reasoning: true,
      cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0 },
      contextWindow: 200_000,
      maxTokens: 64_000,
    } as Model<Api>;
  }

  return { model, authStorage, modelRegistry };
}

// ─── Session management ──────────────────────────────────────────────────────

export function resolveSessionFile(sessionId: string): string {
  return path.join(SESSION_DIR, `${sessionId}.json`);
}

// ─── System prompt override ──────────────────────────────────────────────────

export function applySystemPromptToSession(
  session: { agent: { setSystemPrompt(prompt: string): void } },
  systemPrompt: string,
) {
  session.agent.setSystemPrompt(systemPrompt);
  const mutable = session as unknown as {
    _baseSystemPrompt?: string;
    _rebuildSystemPrompt?: (toolNames: string[]) => string;
  };
  mutable._baseSystemPrompt = systemPrompt;
  mutable._rebuildSystemPrompt = () => systemPrompt;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function isTextPart(part: unknown): part is { type: "text"; text: string } {
  return (
    typeof part === "object" &&
    part !== null &&
    "type" in part &&
    part.type === "text" &&
    "text" in part &&
    typeof part.text === "string"
  );
}

function isToolCallPart(part: unknown): part is { type: "toolCall"; name: string } {
  return (
    typeof part === "object" &&
    part !== null &&
    "type" in part &&
    part.type === "toolCall" &&
    "name" in part &&
    typeof part.name === "string"
  );
}

export function extractAssistantText(messages: AgentMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const msg = messages[i];
    if (!msg || msg.role !== "assistant") continue;
    const content: unknown = msg.content;
    if (typeof content === "string") return content;
    if (Array.isArray(content)) {
      const text = content
        .filter(isTextPart)
        .map((part) => part.text)
        .join("");
      if (text) return text;
    }
  }
  return "";
}

export function extractToolCalls(messages: AgentMessage[]): string[] {
  const toolCalls: string[] = [];
  for (const msg of messages) {
    if (msg.role !== "assistant") continue;
    const content: unknown = msg.content;
    if (!Array.isArray(content)) continue;
    for (const part of content) {
      if (isToolCallPart(part)) {
        toolCalls.push(part.name);
      }
    }
  }
  return toolCalls;
}

/**
 * System prompt builder for linesag: domain framing, tool list, workspace
 * context files and runtime line.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

// ─── Context file loading ────────────────────────────────────────────────────

const CONTEXT_FILE_NAMES = [
  "CONTEXT.md",
  "INSTRUCTIONS.md",
  "INSTRUCTIONS.txt",
  "SOUL.md",
  ".linesag/CONTEXT.md",
];

export type ContextFile = { path: string; content: string };

export function loadContextFiles(workspaceDir: string): ContextFile[] {
  const files: ContextFile[] = [];
  for (const name of CONTEXT_FILE_NAMES) {
    const filePath = path.join(workspaceDir, name);
    try {
      const content = fs.readFileSync(filePath, "utf-8").trim();
      if (content) {
        files.push({ path: name, content });
      }
    } catch {
      // File doesn't exist
    }
  }
  return files;
}

// ─── Runtime info ────────────────────────────────────────────────────────────

export type RuntimeInfo = {
  host: string;
  os: string;
  arch: string;
  node: string;
  shell: string;
  model: string;
  provider: string;
};

export function detectRuntime(provider: string, modelId: string): RuntimeInfo {
  return {
    host: os.hostname(),
    os: process.platform,
    arch: process.arch,
    node: process.version,
    shell: path.basename(process.env.SHELL ?? "bash"),
    model: modelId,
    provider,
  };
}

// ─── Tool summaries ──────────────────────────────────────────────────────────

const CORE_TOOL_SUMMARIES: Record<string, string> = {
  // Built-in
  read: "Read file contents",
  write: "Create or overwrite files",
  edit: "Make precise edits to files",
  bash: "Run shell commands",
  // Overhead line
  line_dip_tension: "Dip/tension of one span (level or inclined), temperature cases, allowable tension check (SVG output)",
  line_wire_lookup: "Look up wire types: unit weight, cross-section, elastic modulus, expansion, breaking strength",
};

// ─── System prompt builder ───────────────────────────────────────────────────

export function buildSystemPrompt(params: {
  workspaceDir: string;
  runtime: RuntimeInfo;
  toolNames: string[];
  contextFiles: ContextFile[];
  catalog?: { path: string; count: number };
  thinkingLevel?: string;
}): string {
  const { workspaceDir, runtime, toolNames, contextFiles, catalog, thinkingLevel } = params;

  // Tool lines
  const toolLines = toolNames
    .map((name) => {
      const summary = CORE_TOOL_SUMMARIES[name];
      return summary ? `- ${name}: ${summary}` : `- ${name}`;
    })
    .filter(Boolean);

  const userTimezone = Intl.DateTimeFormat().resolvedOptions().timeZone;
  const now = new Date();
  const currentTime = now.toLocaleString("en-US", {
    timeZone: userTimezone,
    dateStyle: "full",
    timeStyle: "long",
  });

  const lines = [
    "You are linesag, an assistant for overhead line engineers evaluating wire sag, tension and clearances.",
    "Dip and tension are related by the parabolic catenary approximation D = w·S²/(8T); temperature changes are solved from the reference tension with the wire's elastic modulus, cross-section and expansion coefficient.",
    "Use line_wire_lookup to find wire data and line_dip_tension for every numeric answer; do not estimate sag or tension by hand.",
    "Report dip in mm, tension in kN and state which temperature each value belongs to.",
    "",
    "## Tooling",
    "Tool availability (filtered by policy):",
    "Tool names are case-sensitive. Call tools exactly as listed.",
    toolLines.join("\n"),
    "",
    "## Tool Call Style",
    "Default: do not narrate routine, low-risk tool calls (just call the tool).",
    "Narrate only when it helps: multi-step work, complex/challenging problems, sensitive actions (e.g., deletions), or when the user explicitly asks.",
    "Keep narration brief and value-dense; avoid repeating obvious steps.",
    "Use plain human language for narration unless in a technical context.",
    "",
    "## Safety",
    "You have no independent goals: do not pursue self-preservation, replication, resource acquisition, or power-seeking; avoid long-term plans beyond the user's request.",
    "Prioritize safety and human oversight over completion; if instructions conflict, pause and ask; comply with stop/pause/audit requests and never bypass safeguards.",
    "Do not manipulate or persuade anyone to expand access or disable safeguards.",
    "",
    "## Workspace",
    `Your working directory is: ${workspaceDir}`,
    "Treat this directory as the single global workspace for file operations unless explicitly instructed otherwise.",
    "",
    "## Current Date & Time",
    `Time zone: ${userTimezone}`,
    `Current time: ${currentTime}`,
    "",
  ];

  if (catalog) {
    lines.push(
      "## Wire Catalog",
      `${catalog.count} wire types loaded from ${catalog.path}.`,
      "Wires not in the catalog can be passed inline to line_dip_tension as a wire object.",
      "",
    );
  }

  // Context files
  if (contextFiles.length > 0) {
    const hasSoulFile = contextFiles.some(
      (f) => path.basename(f.path).toLowerCase() === "soul.md",
    );
    lines.push(
      "# Project Context",
      "",
      "The following project context files have been loaded:",
    );
    if (hasSoulFile) {
      lines.push(
        "If SOUL.md is present, embody its persona and tone. Avoid stiff, generic replies; follow its guidance unless higher-priority instructions override it.",
      );
    }
    lines.push("");
    for (const file of contextFiles) {
      lines.push(`## ${file.path}`, "", file.content, "");
    }
  }

  // Runtime
  const runtimeParts = [
    runtime.host ? `host=${runtime.host}` : "",
    runtime.os ? `os=${runtime.os} (${runtime.arch})` : "",
    runtime.node ? `node=${runtime.node}` : "",
    runtime.model ? `model=${runtime.provider}/${runtime.model}` : "",
    runtime.shell ? `shell=${runtime.shell}` : "",
    `thinking=${thinkingLevel ?? "off"}`,
  ].filter(Boolean);

  lines.push("## Runtime", `Runtime: ${runtimeParts.join(" | ")}`);

  return lines.filter((line) => line !== undefined).join("\n");
}

import type { Hono } from "hono";
import type { Config } from "../../../config/config";
import type { LoggingConfig } from "../../../config/types";
import { resolveProviderSettings } from "../../../config/providers";
import type { ToolManager } from "../../../tools/runtime/manager";
import { maskApiKey } from "../../../utils/security/mask-sensitive";

function formatList(items: string[], max = 6): string {
  if (items.length === 0) return "-";
  const head = items.slice(0, max);
  const tail = items.length > max ? `, +${items.length - max} more` : "";
  return head.join(", ") + tail;
}

export function extractEndpoints(app: Hono): string[] {
  const endpoints = app.routes
    .filter((r) => r.method !== "ALL")
    .map((r) => `${r.method} ${r.path}`);
  return Array.from(new Set(endpoints)).sort();
}

function summarizeProvider(config: Config, id: string): string {
  const resolved = resolveProviderSettings(config, id);
  const parts: string[] = [];
  if (resolved?.model) parts.push(`model=${resolved.model}`);
  parts.push(`apiKey=${maskApiKey(resolved?.apiKey)}${resolved?.apiKeySource ? ` (${resolved.apiKeySource})` : ""}`);
  return `   - ${id} ${parts.join(" ")}`;
}

export function formatStartupInfo(port: number, config: Config, manager: ToolManager, endpoints: string[] = []): string[] {
  const base = `http://localhost:${port}`;
  const providers = Object.keys(config.data.llm?.providers ?? {});
  const tools = manager.listAvailableTools();
  const logging: LoggingConfig = config.data.logging ?? {};

  const sections = [
    { icon: "🚀", label: "Server is running", body: base },
    { icon: "📦", label: "Config file", body: config.filePath ?? "(in memory)" },
    { icon: "🔧", label: "Providers", body: `${providers.length} (${formatList(providers)})` },
    { icon: "🛠️", label: "Tools", body: `${tools.length} (${formatList(tools)})` },
    {
      icon: "🗂",
      label: "Logging",
      body: `enabled=${logging.enabled !== false}, level=${logging.level ?? "info"}`,
    },
  ];

  const lines: string[] = [];
  const maxLabelLength = Math.max(...sections.map((s) => s.label.length));
  for (const section of sections) {
    lines.push(`${section.icon} ${section.label.padEnd(maxLabelLength)}  ${section.body}`);
  }

  if (endpoints.length > 0) {
    lines.push("", "📝 Endpoints:");
    for (const e of endpoints) lines.push(`   - ${e}`);
  }

  if (providers.length > 0) {
    lines.push("", "🔧 Providers detail:");
    const maxProviders = 4;
    for (const id of providers.slice(0, maxProviders)) {
      lines.push(summarizeProvider(config, id));
    }
    if (providers.length > maxProviders) lines.push(`   - ... +${providers.length - maxProviders} more`);
  }

  return lines;
}

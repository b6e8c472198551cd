import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type { AppConfig, CostConfig, ExplorerConfig, LiveConfig, RunsConfig } from "@spanscope/contracts";
import { asRecord } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".spanscope", "config.toml");

export const DEFAULT_CONFIG: AppConfig = {
  runs: {
    directory: ".agk/runs",
    traceFileName: "trace.jsonl",
    manifestFileName: "manifest.json",
  },
  live: {
    pollIntervalMs: 500,
  },
  cost: {
    perTokenUsd: 0.00001,
  },
  explorer: {
    contentPreviewChars: 500,
  },
};

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function nonNegativeOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric < 0) return fallback;
  return numeric;
}

function stringOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function mergeRuns(input: Record<string, unknown>): RunsConfig {
  const defaults = DEFAULT_CONFIG.runs;
  return {
    directory: stringOrDefault(input.directory, defaults.directory),
    traceFileName: stringOrDefault(input.traceFileName, defaults.traceFileName),
    manifestFileName: stringOrDefault(input.manifestFileName, defaults.manifestFileName),
  };
}

function mergeLive(input: Record<string, unknown>): LiveConfig {
  return {
    pollIntervalMs: positiveIntOrDefault(input.pollIntervalMs, DEFAULT_CONFIG.live.pollIntervalMs),
  };
}

function mergeCost(input: Record<string, unknown>): CostConfig {
  return {
    perTokenUsd: nonNegativeOrDefault(input.perTokenUsd, DEFAULT_CONFIG.cost.perTokenUsd),
  };
}

function mergeExplorer(input: Record<string, unknown>): ExplorerConfig {
  return {
    contentPreviewChars: positiveIntOrDefault(input.contentPreviewChars, DEFAULT_CONFIG.explorer.contentPreviewChars),
  };
}

export function mergeConfig(input?: unknown): AppConfig {
  const record = asRecord(input);
  return {
    runs: mergeRuns(asRecord(record.runs)),
    live: mergeLive(asRecord(record.live)),
    cost: mergeCost(asRecord(record.cost)),
    explorer: mergeExplorer(asRecord(record.explorer)),
  };
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  try {
    const raw = await readFile(configPath, "utf8");
    return mergeConfig(TOML.parse(raw));
  } catch {
    return mergeConfig();
  }
}

function toJsonMap(config: AppConfig): JsonMap {
  return {
    runs: { ...config.runs },
    live: { ...config.live },
    cost: { ...config.cost },
    explorer: { ...config.explorer },
  };
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  await writeFile(configPath, TOML.stringify(toJsonMap(config)), "utf8");
}

export const CONFIG_KEYS = [
  "runs.directory",
  "runs.traceFileName",
  "runs.manifestFileName",
  "live.pollIntervalMs",
  "cost.perTokenUsd",
  "explorer.contentPreviewChars",
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((key) => key === value);
}

export function getConfigValue(config: AppConfig, key: ConfigKey): string | number {
  switch (key) {
    case "runs.directory":
      return config.runs.directory;
    case "runs.traceFileName":
      return config.runs.traceFileName;
    case "runs.manifestFileName":
      return config.runs.manifestFileName;
    case "live.pollIntervalMs":
      return config.live.pollIntervalMs;
    case "cost.perTokenUsd":
      return config.cost.perTokenUsd;
    case "explorer.contentPreviewChars":
      return config.explorer.contentPreviewChars;
  }
}

/**
 * Returns a copy of `config` with one dotted key replaced. Numeric keys take their
 * value from the string form; an unparseable or out-of-range number keeps the default.
 */
export function setConfigValue(config: AppConfig, key: ConfigKey, raw: string): AppConfig {
  const [section, field] = key.split(".");
  const numeric = Number(raw);
  const sectionValue = { ...asRecord(toJsonMap(config)[section ?? ""]) };
  sectionValue[field ?? ""] = typeof getConfigValue(config, key) === "number" ? numeric : raw;
  return mergeConfig({ ...toJsonMap(config), [section ?? ""]: sectionValue });
}

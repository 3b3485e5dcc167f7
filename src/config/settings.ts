/**
 * Settings loader
 * Reads config.yaml and overlays environment variables. Environment wins.
 *
 * Environment overrides:
 *   ARXIV_CATEGORIES     JSON list, comma-separated list, or a single value
 *   MATCHING_KEYWORDS    JSON map ({"rag": 2.0}), JSON list, or comma-separated list
 *   MATCHING_THRESHOLD   BM25 score threshold
 *   MATCHING_TOP_K       max papers, or "null" for unlimited
 *   LLM_MODEL, LLM_BASE_URL, LLM_API_KEY, LLM_BATCH_SIZE
 *   EMAIL_SMTP_SERVER, EMAIL_SMTP_PORT, EMAIL_SENDER, EMAIL_PASSWORD, EMAIL_RECIPIENTS
 */

import fs from "fs";
import path from "path";
import yaml from "js-yaml";
import { z } from "zod";

export class SettingsError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "SettingsError";
  }
}

const KeywordEntrySchema = z.union([z.string(), z.record(z.string(), z.number())]);

const KeywordsSchema = z.union([
  z.record(z.string(), z.number()),
  z.array(KeywordEntrySchema),
]);

const FileSchema = z.object({
  arxiv: z
    .object({ categories: z.array(z.string()).optional() })
    .optional(),
  data: z.object({ base_dir: z.string().optional() }).optional(),
  logging: z
    .object({
      dir: z.string().optional(),
      level: z.string().optional(),
    })
    .optional(),
  matching: z
    .object({
      keywords: KeywordsSchema.nullish(),
      threshold: z.number().optional(),
      top_k: z.number().int().nullish(),
    })
    .optional(),
  llm: z
    .object({
      model_name: z.string().optional(),
      api_key: z.string().optional(),
      base_url: z.string().optional(),
      batch_size: z.number().int().positive().optional(),
    })
    .optional(),
  email: z
    .object({
      smtp_server: z.string().optional(),
      smtp_port: z.number().int().positive().optional(),
      sender: z.string().optional(),
      password: z.string().optional(),
      recipients: z.array(z.string()).optional(),
    })
    .optional(),
});

type FileConfig = z.infer<typeof FileSchema>;

export interface LlmSettings {
  model: string;
  apiKey: string;
  baseUrl: string;
  batchSize: number;
}

export interface EmailSettings {
  smtpServer: string;
  smtpPort: number;
  sender: string;
  password: string;
  recipients: string[];
}

export interface Settings {
  categories: string[];
  dataDir: string;
  logDir: string;
  logLevel: string;
  keywords: Record<string, number>;
  threshold: number;
  topK: number | null;
  llm: LlmSettings;
  email: EmailSettings;
}

export const DEFAULT_CATEGORIES = ["cs.CV", "cs.CL"];

type Env = Record<string, string | undefined>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Parse a structured env var: JSON first, then a comma-separated list,
 * then the bare value. Returns undefined when unset or blank.
 */
export function parseStructuredEnv(value: string | undefined): unknown {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;

  const json = tryParseJson(trimmed);
  if (json.ok) return json.value;

  if (trimmed.includes(",")) {
    return trimmed
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }

  return [trimmed];
}

function envList(env: Env, name: string): string[] | undefined {
  const parsed = parseStructuredEnv(env[name]);
  if (parsed === undefined) return undefined;

  const result = z.array(z.string()).safeParse(parsed);
  if (!result.success) {
    throw new SettingsError(`Invalid ${name}`, formatIssues(result.error));
  }
  return result.data;
}

function envNumber(env: Env, name: string, integer: boolean): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new SettingsError(`Invalid ${name}: ${raw}`);
  }
  return value;
}

function envString(env: Env, name: string): string | undefined {
  return env[name] || undefined;
}

/**
 * Flatten list-or-map keyword config into term -> weight.
 * List entries may be bare terms (weight 1.0) or single-entry maps.
 */
export function normalizeKeywordConfig(raw: unknown): Record<string, number> {
  if (raw === undefined || raw === null) return {};

  const parsed = KeywordsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SettingsError("Invalid matching.keywords", formatIssues(parsed.error));
  }

  if (!Array.isArray(parsed.data)) {
    return { ...parsed.data };
  }

  const keywords: Record<string, number> = {};
  for (const entry of parsed.data) {
    if (typeof entry === "string") {
      keywords[entry] = 1.0;
    } else {
      Object.assign(keywords, entry);
    }
  }
  return keywords;
}

function resolvePath(target: string, baseDir: string): string {
  return path.isAbsolute(target) ? target : path.resolve(baseDir, target);
}

function readConfigFile(configPath: string): FileConfig {
  const content = fs.readFileSync(configPath, "utf-8");

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new SettingsError(
      `Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = FileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new SettingsError(`Invalid config file ${configPath}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

export interface LoadSettingsOptions {
  configPath?: string;
  env?: Env;
}

/**
 * Load settings from YAML (if present) and environment variables.
 * Relative directories resolve against the config file's directory,
 * or the working directory when there is no config file.
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const env = options.env ?? process.env;
  const configPath = path.resolve(options.configPath ?? "config.yaml");

  let file: FileConfig = {};
  let projectRoot = process.cwd();

  if (fs.existsSync(configPath)) {
    file = readConfigFile(configPath);
    projectRoot = path.dirname(configPath);
  }

  const envKeywords = parseStructuredEnv(env.MATCHING_KEYWORDS);
  const keywords = normalizeKeywordConfig(envKeywords ?? file.matching?.keywords);

  let topK: number | null = file.matching?.top_k ?? null;
  const rawTopK = env.MATCHING_TOP_K?.trim();
  if (rawTopK) {
    topK = rawTopK.toLowerCase() === "null" ? null : envNumber(env, "MATCHING_TOP_K", true) ?? null;
  }

  return {
    categories: envList(env, "ARXIV_CATEGORIES") ?? file.arxiv?.categories ?? [...DEFAULT_CATEGORIES],
    dataDir: resolvePath(file.data?.base_dir ?? "../data", projectRoot),
    logDir: resolvePath(file.logging?.dir ?? "../logs", projectRoot),
    logLevel: file.logging?.level ?? "INFO",
    keywords,
    threshold: envNumber(env, "MATCHING_THRESHOLD", false) ?? file.matching?.threshold ?? 0.5,
    topK,
    llm: {
      model: envString(env, "LLM_MODEL") ?? file.llm?.model_name ?? "deepseek-chat",
      apiKey: envString(env, "LLM_API_KEY") ?? file.llm?.api_key ?? "",
      baseUrl: envString(env, "LLM_BASE_URL") ?? file.llm?.base_url ?? "https://api.deepseek.com",
      batchSize: envNumber(env, "LLM_BATCH_SIZE", true) ?? file.llm?.batch_size ?? 3,
    },
    email: {
      smtpServer: envString(env, "EMAIL_SMTP_SERVER") ?? file.email?.smtp_server ?? "",
      smtpPort: envNumber(env, "EMAIL_SMTP_PORT", true) ?? file.email?.smtp_port ?? 587,
      sender: envString(env, "EMAIL_SENDER") ?? file.email?.sender ?? "",
      password: envString(env, "EMAIL_PASSWORD") ?? file.email?.password ?? "",
      recipients: envList(env, "EMAIL_RECIPIENTS") ?? file.email?.recipients ?? [],
    },
  };
}

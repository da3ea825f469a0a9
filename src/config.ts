import { readFileSync } from 'fs';
import { ConfigError } from './errors.js';
import { DEFAULT_PROMPTS, type PromptSet } from './prompts.js';

export type LlmProvider = 'groq' | 'anthropic';

export interface LlmConfig {
  provider: LlmProvider;
  apiKey: string;
  apiUrl: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

export interface SearchConfig {
  queries: string[];
  maxQueries: number;
  resultsPerQuery: number;
  snippetChars: number;
  timeoutMs: number;
  locale: string;
  region: string;
}

export interface LinkedInConfig {
  accessToken?: string;
  personUrn?: string;
  tokenFile: string;
  apiUrl: string;
  version: string;
  timeoutMs: number;
}

export interface AppConfig {
  llm: LlmConfig;
  search: SearchConfig;
  linkedin: LinkedInConfig;
  prompts: PromptSet;
  historyFile: string;
  historyLimit: number;
  maxCandidates: number;
  schedule: { cron?: string; timezone: string };
  slackWebhookUrl?: string;
}

export const DEFAULT_SEARCH_QUERIES = [
  'Android development trends 2025',
  'Kotlin new features latest',
  'Jetpack Compose updates',
  'Android developer tips',
  'Mobile app development trends',
];

const GROQ_API_URL = 'https://api.groq.com/openai/v1';
const ANTHROPIC_API_URL = 'https://api.anthropic.com';

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  groq: 'llama-3.3-70b-versatile',
  anthropic: 'claude-haiku-4-5-20251001',
};

type Env = Record<string, string | undefined>;

function positiveInt(value: string | undefined, fallback: number): number {
  const n = parseInt(value || '', 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseProvider(value: string | undefined): LlmProvider {
  const provider = (value || 'groq').trim().toLowerCase();
  if (provider === 'groq' || provider === 'anthropic') return provider;
  throw new ConfigError(`Unsupported LLM_PROVIDER "${value}". Use "groq" or "anthropic".`);
}

function parseQueries(value: string | undefined): string[] {
  const queries = (value || '')
    .split('|')
    .map((q) => q.trim())
    .filter(Boolean);
  return queries.length > 0 ? queries : DEFAULT_SEARCH_QUERIES;
}

function loadPrompts(personaFile: string | undefined): PromptSet {
  if (!personaFile) return DEFAULT_PROMPTS;

  let system: string;
  try {
    system = readFileSync(personaFile, 'utf8').trim();
  } catch (err) {
    throw new ConfigError(`Cannot read PERSONA_PROMPT_FILE ${personaFile}: ${err instanceof Error ? err.message : err}`);
  }
  if (!system) throw new ConfigError(`PERSONA_PROMPT_FILE ${personaFile} is empty.`);

  return { ...DEFAULT_PROMPTS, system };
}

/**
 * Builds the configuration once at process start.
 * Components receive the slice they need; none of them reads the environment.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const provider = parseProvider(env.LLM_PROVIDER);

  return {
    llm: {
      provider,
      apiKey: (provider === 'groq' ? env.GROQ_API_KEY : env.ANTHROPIC_API_KEY)?.trim() || '',
      apiUrl: provider === 'groq' ? env.GROQ_API_URL || GROQ_API_URL : env.ANTHROPIC_API_URL || ANTHROPIC_API_URL,
      model: optional(env.LLM_MODEL) ?? DEFAULT_MODELS[provider],
      maxTokens: positiveInt(env.LLM_MAX_TOKENS, 1024),
      timeoutMs: positiveInt(env.LLM_TIMEOUT_MS, 30_000),
    },
    search: {
      queries: parseQueries(env.SEARCH_QUERIES),
      maxQueries: positiveInt(env.SEARCH_MAX_QUERIES, 3),
      resultsPerQuery: positiveInt(env.SEARCH_RESULTS_PER_QUERY, 3),
      snippetChars: 200,
      timeoutMs: positiveInt(env.SEARCH_TIMEOUT_MS, 10_000),
      locale: optional(env.SEARCH_LOCALE) ?? 'en-US',
      region: optional(env.SEARCH_REGION) ?? 'US',
    },
    linkedin: {
      accessToken: optional(env.LINKEDIN_ACCESS_TOKEN),
      personUrn: optional(env.LINKEDIN_PERSON_URN),
      tokenFile: env.LINKEDIN_TOKEN_FILE || 'linkedin_tokens.json',
      apiUrl: (env.LINKEDIN_API_URL || 'https://api.linkedin.com').replace(/\/$/, ''),
      version: optional(env.LINKEDIN_VERSION) ?? '202401',
      timeoutMs: positiveInt(env.LINKEDIN_TIMEOUT_MS, 30_000),
    },
    prompts: loadPrompts(optional(env.PERSONA_PROMPT_FILE)),
    historyFile: env.POST_HISTORY_FILE || 'post_history.json',
    historyLimit: positiveInt(env.POST_HISTORY_LIMIT, 50),
    maxCandidates: 5,
    schedule: {
      cron: optional(env.SCHEDULE_CRON),
      timezone: optional(env.SCHEDULE_TIMEZONE) ?? 'UTC',
    },
    slackWebhookUrl: optional(env.SLACK_WEBHOOK_URL),
  };
}

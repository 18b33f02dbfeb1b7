/**
 * Unified config loader for the hybrid analyst.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml > built-in defaults
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { DEFAULTS, REPAIR_CONFIG, isRecord } from "../config.js"

// ── Types ────────────────────────────────────────────────────────────

export type OracleProvider = "ollama" | "rule_based"

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

export interface AnalystConfig {
	database: {
		path: string
		max_rows: number
		key_tables: string[]
	}
	corpus: {
		docs_dir: string
	}
	model: {
		provider: OracleProvider
		llm: string
		ollama_url: string
		timeout_ms: number
		temperature: number
		max_tokens: number
	}
	retrieval: {
		top_k: number
		max_features: number
	}
	repair: {
		max_attempts: number
	}
	features: {
		normalize_sql: boolean
	}
	logging: {
		level: LogLevel
	}
}

function defaultConfig(): AnalystConfig {
	return {
		database: {
			path: "data/northwind.sqlite",
			max_rows: DEFAULTS.maxRows,
			key_tables: [...DEFAULTS.keyTables],
		},
		corpus: {
			docs_dir: "docs",
		},
		model: {
			provider: "ollama",
			llm: "phi3.5:3.8b-mini-instruct-q4_K_M",
			ollama_url: "http://localhost:11434",
			timeout_ms: 120000,
			temperature: 0,
			max_tokens: 512,
		},
		retrieval: {
			top_k: DEFAULTS.topK,
			max_features: DEFAULTS.maxFeatures,
		},
		repair: {
			max_attempts: REPAIR_CONFIG.maxRepairs,
		},
		features: {
			normalize_sql: true,
		},
		logging: {
			level: "info",
		},
	}
}

// ── YAML Loading ─────────────────────────────────────────────────────

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): Record<string, unknown> {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed = yaml.load(raw)
	return isRecord(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isRecord(right) && isRecord(left)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Typed reads ──────────────────────────────────────────────────────

function section(source: Record<string, unknown>, name: string): Record<string, unknown> {
	const value = source[name]
	return isRecord(value) ? value : {}
}

function readString(source: Record<string, unknown>, key: string, fallback: string): string {
	const value = source[key]
	return typeof value === "string" ? value : fallback
}

function readNumber(source: Record<string, unknown>, key: string, fallback: number): number {
	const value = source[key]
	return typeof value === "number" && Number.isFinite(value) ? value : fallback
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
	const value = source[key]
	return typeof value === "boolean" ? value : fallback
}

function readStringList(source: Record<string, unknown>, key: string, fallback: string[]): string[] {
	const value = source[key]
	if (!Array.isArray(value)) return fallback
	return value.filter((item): item is string => typeof item === "string")
}

function toProvider(value: string | undefined, fallback: OracleProvider): OracleProvider {
	return value === "ollama" || value === "rule_based" ? value : fallback
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
	switch (value) {
		case "debug":
		case "info":
		case "warn":
		case "error":
		case "silent":
			return value
		default:
			return fallback
	}
}

function fromMerged(merged: Record<string, unknown>): AnalystConfig {
	const d = defaultConfig()
	const db = section(merged, "database")
	const corpus = section(merged, "corpus")
	const model = section(merged, "model")
	const retrieval = section(merged, "retrieval")
	const repair = section(merged, "repair")
	const features = section(merged, "features")
	const logging = section(merged, "logging")

	return {
		database: {
			path: readString(db, "path", d.database.path),
			max_rows: readNumber(db, "max_rows", d.database.max_rows),
			key_tables: readStringList(db, "key_tables", d.database.key_tables),
		},
		corpus: {
			docs_dir: readString(corpus, "docs_dir", d.corpus.docs_dir),
		},
		model: {
			provider: toProvider(readString(model, "provider", d.model.provider), d.model.provider),
			llm: readString(model, "llm", d.model.llm),
			ollama_url: readString(model, "ollama_url", d.model.ollama_url),
			timeout_ms: readNumber(model, "timeout_ms", d.model.timeout_ms),
			temperature: readNumber(model, "temperature", d.model.temperature),
			max_tokens: readNumber(model, "max_tokens", d.model.max_tokens),
		},
		retrieval: {
			top_k: readNumber(retrieval, "top_k", d.retrieval.top_k),
			max_features: readNumber(retrieval, "max_features", d.retrieval.max_features),
		},
		repair: {
			max_attempts: readNumber(repair, "max_attempts", d.repair.max_attempts),
		},
		features: {
			normalize_sql: readBoolean(features, "normalize_sql", d.features.normalize_sql),
		},
		logging: {
			level: toLogLevel(readString(logging, "level", d.logging.level), d.logging.level),
		},
	}
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envBoolDefaultOn(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v !== "false" && v !== "0"
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: AnalystConfig): void {
	const db = cfg.database
	db.path = env("ANALYST_DB_PATH") ?? db.path
	db.max_rows = envInt("ANALYST_MAX_ROWS") ?? db.max_rows

	cfg.corpus.docs_dir = env("ANALYST_DOCS_DIR") ?? cfg.corpus.docs_dir

	const m = cfg.model
	m.provider = toProvider(env("ORACLE_PROVIDER"), m.provider)
	m.llm = env("OLLAMA_MODEL") ?? m.llm
	m.ollama_url = env("OLLAMA_BASE_URL") ?? m.ollama_url
	m.timeout_ms = envInt("OLLAMA_TIMEOUT_MS") ?? m.timeout_ms
	m.temperature = envFloat("TEMPERATURE") ?? m.temperature
	m.max_tokens = envInt("MAX_TOKENS") ?? m.max_tokens

	cfg.retrieval.top_k = envInt("RETRIEVAL_TOP_K") ?? cfg.retrieval.top_k
	cfg.repair.max_attempts = envInt("REPAIR_MAX_ATTEMPTS") ?? cfg.repair.max_attempts
	cfg.features.normalize_sql = envBoolDefaultOn("NORMALIZE_SQL_ENABLED") ?? cfg.features.normalize_sql
	cfg.logging.level = toLogLevel(env("LOG_LEVEL"), cfg.logging.level)
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: AnalystConfig | null = null

export function loadConfig(): AnalystConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: Record<string, unknown> = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	const config = fromMerged(merged)
	applyEnvOverrides(config)
	_config = config
	return _config
}

export function getConfig(): AnalystConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}

/**
 * Resolve a configured path. Relative paths are taken from the directory
 * holding config/, or from cwd when there is none.
 */
export function resolveProjectPath(p: string): string {
	if (path.isAbsolute(p)) return p
	const configDir = findConfigDir()
	return path.resolve(configDir ? path.dirname(configDir) : process.cwd(), p)
}

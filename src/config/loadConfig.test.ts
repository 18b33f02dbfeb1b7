import { describe, it, expect, beforeEach, afterEach } from "vitest"
import * as fs from "fs"
import * as path from "path"
import * as os from "os"
import { loadConfig, resetConfig, getConfig, resolveProjectPath } from "./loadConfig.js"

/**
 * Tests for the unified config loader.
 *
 * Strategy: create a temp directory with config/config.yaml (and optionally
 * config.local.yaml), chdir into it, and verify loadConfig() reads the right
 * values. Env-var overrides are tested by setting process.env before loading.
 */

let tmpDir: string
let originalCwd: string
const savedEnv: Record<string, string | undefined> = {}

// Env vars the loader reads, saved and restored around each test
const ENV_VARS = [
	"ANALYST_DB_PATH", "ANALYST_MAX_ROWS", "ANALYST_DOCS_DIR",
	"ORACLE_PROVIDER", "OLLAMA_MODEL", "OLLAMA_BASE_URL", "OLLAMA_TIMEOUT_MS",
	"TEMPERATURE", "MAX_TOKENS", "RETRIEVAL_TOP_K", "REPAIR_MAX_ATTEMPTS",
	"NORMALIZE_SQL_ENABLED", "LOG_LEVEL",
]

function writeYaml(dir: string, filename: string, content: string) {
	const configDir = path.join(dir, "config")
	fs.mkdirSync(configDir, { recursive: true })
	fs.writeFileSync(path.join(configDir, filename), content)
}

beforeEach(() => {
	resetConfig()
	for (const v of ENV_VARS) {
		savedEnv[v] = process.env[v]
		delete process.env[v]
	}
	tmpDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "analyst-config-test-")))
	originalCwd = process.cwd()
	process.chdir(tmpDir)
})

afterEach(() => {
	process.chdir(originalCwd)
	fs.rmSync(tmpDir, { recursive: true, force: true })
	for (const v of ENV_VARS) {
		if (savedEnv[v] === undefined) {
			delete process.env[v]
		} else {
			process.env[v] = savedEnv[v]
		}
	}
	resetConfig()
})

// ── Basic Loading ─────────────────────────────────────────────────────

describe("loadConfig: basic YAML loading", () => {
	it("loads values from config/config.yaml", () => {
		writeYaml(tmpDir, "config.yaml", `
database:
  path: data/shop.sqlite
  max_rows: 50
  key_tables: [Orders, Products]
corpus:
  docs_dir: corpus
model:
  provider: rule_based
  llm: "llama3.1:8b"
  ollama_url: "http://localhost:9999"
  timeout_ms: 5000
  temperature: 0.5
  max_tokens: 256
retrieval:
  top_k: 5
  max_features: 200
repair:
  max_attempts: 1
features:
  normalize_sql: false
logging:
  level: debug
`)
		const cfg = loadConfig()

		expect(cfg.database.path).toBe("data/shop.sqlite")
		expect(cfg.database.max_rows).toBe(50)
		expect(cfg.database.key_tables).toEqual(["Orders", "Products"])
		expect(cfg.corpus.docs_dir).toBe("corpus")

		expect(cfg.model.provider).toBe("rule_based")
		expect(cfg.model.llm).toBe("llama3.1:8b")
		expect(cfg.model.ollama_url).toBe("http://localhost:9999")
		expect(cfg.model.timeout_ms).toBe(5000)
		expect(cfg.model.temperature).toBe(0.5)
		expect(cfg.model.max_tokens).toBe(256)

		expect(cfg.retrieval.top_k).toBe(5)
		expect(cfg.retrieval.max_features).toBe(200)
		expect(cfg.repair.max_attempts).toBe(1)
		expect(cfg.features.normalize_sql).toBe(false)
		expect(cfg.logging.level).toBe("debug")
	})

	it("falls back to built-in defaults when no config directory exists", () => {
		const cfg = loadConfig()
		expect(cfg.database.path).toBe("data/northwind.sqlite")
		expect(cfg.database.max_rows).toBe(1000)
		expect(cfg.corpus.docs_dir).toBe("docs")
		expect(cfg.model.provider).toBe("ollama")
		expect(cfg.retrieval.top_k).toBe(3)
		expect(cfg.repair.max_attempts).toBe(2)
		expect(cfg.features.normalize_sql).toBe(true)
		expect(cfg.logging.level).toBe("info")
	})

	it("ignores values of the wrong type", () => {
		writeYaml(tmpDir, "config.yaml", `
database:
  max_rows: "lots"
model:
  provider: openai
logging:
  level: LOUD
`)
		const cfg = loadConfig()
		expect(cfg.database.max_rows).toBe(1000)
		expect(cfg.model.provider).toBe("ollama")
		expect(cfg.logging.level).toBe("info")
	})

	it("is a singleton: second call returns same object", () => {
		writeYaml(tmpDir, "config.yaml", "database:\n  path: one.sqlite\n")
		const a = loadConfig()
		const b = loadConfig()
		expect(a).toBe(b)
	})

	it("resetConfig clears the singleton", () => {
		writeYaml(tmpDir, "config.yaml", "database:\n  path: one.sqlite\n")
		const a = loadConfig()
		resetConfig()
		writeYaml(tmpDir, "config.yaml", "database:\n  path: two.sqlite\n")
		const b = loadConfig()
		expect(a.database.path).toBe("one.sqlite")
		expect(b.database.path).toBe("two.sqlite")
	})

	it("getConfig() auto-loads if not loaded", () => {
		writeYaml(tmpDir, "config.yaml", "corpus:\n  docs_dir: autoload\n")
		expect(getConfig().corpus.docs_dir).toBe("autoload")
	})
})

// ── Deep Merge (config.local.yaml overrides) ──────────────────────────

describe("loadConfig: config.local.yaml overlay", () => {
	it("local YAML overrides base YAML values without clobbering siblings", () => {
		writeYaml(tmpDir, "config.yaml", `
database:
  path: base.sqlite
  max_rows: 100
model:
  llm: "base-model"
  temperature: 0.2
`)
		writeYaml(tmpDir, "config.local.yaml", `
model:
  llm: "local-model"
`)
		const cfg = loadConfig()
		expect(cfg.model.llm).toBe("local-model")
		expect(cfg.model.temperature).toBe(0.2)     // kept from base
		expect(cfg.database.path).toBe("base.sqlite") // section not in local
		expect(cfg.database.max_rows).toBe(100)
	})

	it("missing config.local.yaml is fine, only base is used", () => {
		writeYaml(tmpDir, "config.yaml", "corpus:\n  docs_dir: onlybase\n")
		expect(loadConfig().corpus.docs_dir).toBe("onlybase")
	})
})

// ── Env-Var Overrides ─────────────────────────────────────────────────

describe("loadConfig: env-var overrides", () => {
	it("env vars override YAML values", () => {
		writeYaml(tmpDir, "config.yaml", `
database:
  path: yaml.sqlite
corpus:
  docs_dir: yamldocs
model:
  llm: "yaml-model"
  provider: ollama
`)
		process.env.ANALYST_DB_PATH = "/srv/env.sqlite"
		process.env.ANALYST_DOCS_DIR = "envdocs"
		process.env.OLLAMA_MODEL = "env-model"
		process.env.ORACLE_PROVIDER = "rule_based"

		const cfg = loadConfig()
		expect(cfg.database.path).toBe("/srv/env.sqlite")
		expect(cfg.corpus.docs_dir).toBe("envdocs")
		expect(cfg.model.llm).toBe("env-model")
		expect(cfg.model.provider).toBe("rule_based")
	})

	it("numeric env vars are parsed correctly", () => {
		writeYaml(tmpDir, "config.yaml", "retrieval:\n  top_k: 3\n")
		process.env.RETRIEVAL_TOP_K = "7"
		process.env.TEMPERATURE = "0.7"
		process.env.OLLAMA_TIMEOUT_MS = "30000"
		process.env.REPAIR_MAX_ATTEMPTS = "1"
		process.env.ANALYST_MAX_ROWS = "25"

		const cfg = loadConfig()
		expect(cfg.retrieval.top_k).toBe(7)
		expect(cfg.model.temperature).toBe(0.7)
		expect(cfg.model.timeout_ms).toBe(30000)
		expect(cfg.repair.max_attempts).toBe(1)
		expect(cfg.database.max_rows).toBe(25)
	})

	it("unparseable numeric env vars keep the YAML value", () => {
		writeYaml(tmpDir, "config.yaml", "retrieval:\n  top_k: 4\n")
		process.env.RETRIEVAL_TOP_K = "many"
		expect(loadConfig().retrieval.top_k).toBe(4)
	})

	it("NORMALIZE_SQL_ENABLED is on unless set to false or 0", () => {
		writeYaml(tmpDir, "config.yaml", "features:\n  normalize_sql: true\n")
		process.env.NORMALIZE_SQL_ENABLED = "0"
		expect(loadConfig().features.normalize_sql).toBe(false)

		resetConfig()
		process.env.NORMALIZE_SQL_ENABLED = "yes"
		expect(loadConfig().features.normalize_sql).toBe(true)
	})

	it("LOG_LEVEL must name a known level", () => {
		writeYaml(tmpDir, "config.yaml", "logging:\n  level: warn\n")
		process.env.LOG_LEVEL = "debug"
		expect(loadConfig().logging.level).toBe("debug")

		resetConfig()
		process.env.LOG_LEVEL = "chatty"
		expect(loadConfig().logging.level).toBe("warn")
	})
})

// ── Path resolution ───────────────────────────────────────────────────

describe("resolveProjectPath", () => {
	it("resolves relative paths against the directory holding config/", () => {
		writeYaml(tmpDir, "config.yaml", "corpus:\n  docs_dir: docs\n")
		const nested = path.join(tmpDir, "scripts")
		fs.mkdirSync(nested)
		process.chdir(nested)
		expect(resolveProjectPath("docs")).toBe(path.join(tmpDir, "docs"))
	})

	it("leaves absolute paths alone", () => {
		expect(resolveProjectPath("/srv/data.sqlite")).toBe("/srv/data.sqlite")
	})
})

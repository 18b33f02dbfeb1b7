/**
 * Wires a HybridAgent from configuration: the oracle provider, the SQLite
 * engine and the corpus retriever. Missing database or corpus throws a
 * configuration error here, before any question is taken.
 */

import type { Logger, Oracle } from "./config.js"
import { resolveProjectPath, type AnalystConfig } from "./config/loadConfig.js"
import { OllamaOracle } from "./oracle_client.js"
import { LexicalRetriever } from "./retriever.js"
import { RuleBasedOracle } from "./rule_based_oracle.js"
import { SqliteEngine } from "./sqlite_engine.js"
import { HybridAgent } from "./workflow.js"

export function createOracle(config: AnalystConfig): Oracle {
	if (config.model.provider === "rule_based") {
		return new RuleBasedOracle()
	}
	return new OllamaOracle({
		baseUrl: config.model.ollama_url,
		model: config.model.llm,
		timeoutMs: config.model.timeout_ms,
		temperature: config.model.temperature,
		maxTokens: config.model.max_tokens,
	})
}

export function createHybridAgent(config: AnalystConfig, logger: Logger, oracle: Oracle = createOracle(config)): HybridAgent {
	const dbPath = resolveProjectPath(config.database.path)
	const docsDir = resolveProjectPath(config.corpus.docs_dir)

	const engine = new SqliteEngine(dbPath, {
		maxRows: config.database.max_rows,
		keyTables: config.database.key_tables,
	})
	const retriever = LexicalRetriever.fromDirectory(docsDir, { maxFeatures: config.retrieval.max_features })

	logger.info("Hybrid agent ready", {
		database: dbPath,
		docs: docsDir,
		chunks: retriever.size,
		provider: config.model.provider,
		model: config.model.provider === "ollama" ? config.model.llm : undefined,
	})

	return new HybridAgent({
		retriever,
		engine,
		oracle,
		logger,
		options: {
			topK: config.retrieval.top_k,
			maxRepairs: config.repair.max_attempts,
			normalizeSql: config.features.normalize_sql,
		},
	})
}

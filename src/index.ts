/**
 * Hybrid Analyst MCP Server
 *
 * Exposes one tool, `ask`, that answers an analytic question over the
 * Northwind database and the document corpus.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { z } from "zod"
import { errorMessage, type Logger } from "./config.js"
import { loadConfig, type AnalystConfig } from "./config/loadConfig.js"
import { createHybridAgent } from "./agent_factory.js"
import type { HybridAgent } from "./workflow.js"

export const configSchema = z.object({
	dbPath: z.string().min(1).optional().describe("SQLite database file"),
	docsDir: z.string().min(1).optional().describe("Directory of markdown documents"),
	provider: z.enum(["ollama", "rule_based"]).optional().describe("Text-generation provider"),
})

export type ServerConfig = z.infer<typeof configSchema>

/** Startup overrides on top of the YAML/env configuration */
export function mergeServerConfig(base: AnalystConfig, overrides: ServerConfig): AnalystConfig {
	return {
		...base,
		database: { ...base.database, path: overrides.dbPath ?? base.database.path },
		corpus: { ...base.corpus, docs_dir: overrides.docsDir ?? base.corpus.docs_dir },
		model: { ...base.model, provider: overrides.provider ?? base.model.provider },
	}
}

export function registerAskTool(server: McpServer, agent: HybridAgent, logger: Logger): void {
	server.tool(
		"ask",
		"Answer an analytic question using the Northwind database and the document corpus. " +
			"Returns the answer coerced to format_hint, the SQL used, a confidence score and citations.",
		{
			question: z.string().min(1).describe("Natural-language question"),
			format_hint: z
				.string()
				.default("")
				.describe("Answer shape: int, float, list[...], a {...} record hint, or empty"),
		},
		async ({ question, format_hint }) => {
			try {
				const response = await agent.run(question, format_hint)
				return { content: [{ type: "text", text: JSON.stringify(response, null, 2) }] }
			} catch (error) {
				logger.error("ask failed", { error: errorMessage(error) })
				return { content: [{ type: "text", text: `Error: ${errorMessage(error)}` }], isError: true }
			}
		},
	)
}

export default function createServer({ config, logger }: { config: ServerConfig; logger: Logger }): McpServer {
	const analystConfig = mergeServerConfig(loadConfig(), config)
	const agent = createHybridAgent(analystConfig, logger)

	const server = new McpServer({ name: "hybrid-analyst", version: "0.1.0" })
	registerAskTool(server, agent, logger)
	return server
}

export { HybridAgent } from "./workflow.js"
export { createHybridAgent, createOracle } from "./agent_factory.js"
export { LexicalRetriever } from "./retriever.js"
export { SqliteEngine } from "./sqlite_engine.js"
export { OllamaOracle } from "./oracle_client.js"
export { RuleBasedOracle } from "./rule_based_oracle.js"
export { createLogger, silentLogger } from "./logger.js"
export type { RunResponse, Oracle, OracleRequest, Logger } from "./config.js"

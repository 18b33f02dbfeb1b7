#!/usr/bin/env node
/**
 * Stdio entry point for the Hybrid Analyst MCP Server
 *
 * Config priority:
 *   1. CLI argument (JSON, validated by configSchema)
 *   2. Environment variables and config/config.yaml (see loadConfig)
 *
 * Usage:
 *   node stdio.js '{"dbPath":"data/northwind.sqlite","docsDir":"docs"}'
 *
 * Or via environment variables:
 *   ANALYST_DB_PATH=data/northwind.sqlite ORACLE_PROVIDER=rule_based node stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { errorMessage } from "./config.js"
import { loadConfig } from "./config/loadConfig.js"
import createServer, { configSchema, type ServerConfig } from "./index.js"
import { createLogger } from "./logger.js"

// stderr only; stdout is reserved for the MCP protocol
const logger = createLogger(loadConfig().logging.level)

function parseCliConfig(): ServerConfig {
	const configArg = process.argv[2]
	if (!configArg) {
		logger.info("Config loaded from environment and config files")
		return {}
	}
	try {
		const validated = configSchema.parse(JSON.parse(configArg))
		logger.info("Config loaded from CLI argument")
		return validated
	} catch (e) {
		logger.error("Failed to parse config from CLI argument", { error: errorMessage(e) })
		logger.error('Usage: node stdio.js \'{"dbPath":"data/northwind.sqlite","docsDir":"docs"}\'')
		process.exit(1)
	}
}

async function main() {
	const config = parseCliConfig()

	logger.info("Starting Hybrid Analyst MCP Server with stdio transport")

	const server = createServer({ config, logger })

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("Hybrid Analyst MCP Server running via stdio")

	const shutdown = async () => {
		logger.info("Shutting down...")
		await server.close()
		process.exit(0)
	}
	const onSignal = () => {
		shutdown().catch((error) => {
			logger.error("Shutdown failed", { error: errorMessage(error) })
			process.exit(1)
		})
	}
	process.on("SIGINT", onSignal)
	process.on("SIGTERM", onSignal)
}

main().catch((error) => {
	logger.error("Fatal error", { error: errorMessage(error) })
	process.exit(1)
})

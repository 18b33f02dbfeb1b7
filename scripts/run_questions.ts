/**
 * Batch runner
 *
 * Answers every question in a JSONL file and writes one JSONL output line
 * per question.
 *
 * Input lines:  {"id": "...", "question": "...", "format_hint": "int"}
 * Output lines: {"id", "final_answer", "sql", "confidence", "explanation", "citations"}
 *
 * Usage:
 *   npx tsx scripts/run_questions.ts data/sample_questions.jsonl outputs.jsonl
 *   ORACLE_PROVIDER=rule_based npx tsx scripts/run_questions.ts data/sample_questions.jsonl outputs.jsonl
 */

import fs from "fs"
import path from "path"
import { isRecord, errorMessage } from "../src/config.js"
import { loadConfig } from "../src/config/loadConfig.js"
import { createHybridAgent } from "../src/agent_factory.js"
import { createLogger } from "../src/logger.js"

interface BatchQuestion {
	id: string
	question: string
	format_hint: string
}

function parseLine(line: string, lineNo: number): BatchQuestion {
	const parsed: unknown = JSON.parse(line)
	if (!isRecord(parsed) || typeof parsed.question !== "string") {
		throw new Error(`Line ${lineNo}: expected an object with a "question" string`)
	}
	return {
		id: typeof parsed.id === "string" || typeof parsed.id === "number" ? String(parsed.id) : `q${lineNo}`,
		question: parsed.question,
		format_hint: typeof parsed.format_hint === "string" ? parsed.format_hint : "",
	}
}

async function runQuestions() {
	const [inputArg, outputArg = "outputs.jsonl"] = process.argv.slice(2)
	if (!inputArg) {
		console.error("Usage: npx tsx scripts/run_questions.ts <questions.jsonl> [outputs.jsonl]")
		process.exit(1)
	}

	const config = loadConfig()
	const logger = createLogger(config.logging.level === "debug" ? "debug" : "warn")
	const agent = createHybridAgent(config, logger)

	const questions = fs
		.readFileSync(path.resolve(inputArg), "utf-8")
		.split("\n")
		.map((line, index) => ({ line: line.trim(), lineNo: index + 1 }))
		.filter(({ line }) => line.length > 0)
		.map(({ line, lineNo }) => parseLine(line, lineNo))

	console.log(`Running ${questions.length} questions with provider ${config.model.provider}`)

	const outputs: string[] = []
	let succeeded = 0
	for (const q of questions) {
		const startTime = Date.now()
		const response = await agent.run(q.question, q.format_hint)
		if (response.trace.some(line => line.startsWith("SUCCESS"))) succeeded++

		outputs.push(
			JSON.stringify({
				id: q.id,
				final_answer: response.final_answer,
				sql: response.sql,
				confidence: response.confidence,
				explanation: response.explanation,
				citations: response.citations,
			}),
		)
		console.log(
			`[${q.id}] route=${response.route} repairs=${response.repair_count} ` +
				`confidence=${response.confidence} (${Date.now() - startTime}ms)`,
		)
	}

	fs.writeFileSync(path.resolve(outputArg), outputs.join("\n") + "\n")
	console.log(`\nWrote ${outputs.length} answers to ${outputArg} (${succeeded} with successful SQL)`)
}

runQuestions().catch((error) => {
	console.error(`Batch run failed: ${errorMessage(error)}`)
	process.exit(1)
})

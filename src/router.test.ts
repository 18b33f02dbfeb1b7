import { describe, it, expect } from "vitest"
import type { PipelineContext } from "./config.js"
import { silentLogger } from "./logger.js"
import { normalizeRoute, routeQuestion } from "./router.js"
import { ScriptedOracle } from "./test_fixtures.js"

function context(oracle: ScriptedOracle): PipelineContext {
	return { oracle, logger: silentLogger, run_id: "test-run" }
}

describe("normalizeRoute", () => {
	it("maps replies naming a strategy", () => {
		expect(normalizeRoute("sql")).toBe("sql")
		expect(normalizeRoute("  RAG\n")).toBe("rag")
		expect(normalizeRoute("Hybrid")).toBe("hybrid")
	})

	it("prefers hybrid when the reply mentions both", () => {
		expect(normalizeRoute("This needs both docs and SQL")).toBe("hybrid")
		expect(normalizeRoute("hybrid (rag + sql)")).toBe("hybrid")
	})

	it("prefers sql over rag", () => {
		expect(normalizeRoute("sql, not rag")).toBe("sql")
	})

	it("defaults to hybrid for anything else", () => {
		expect(normalizeRoute("")).toBe("hybrid")
		expect(normalizeRoute("I am not sure")).toBe("hybrid")
	})
})

describe("routeQuestion", () => {
	it("sends the question to the route stage", async () => {
		const oracle = new ScriptedOracle({ route: "Route: sql" })
		const route = await routeQuestion("Top 3 products by revenue?", context(oracle))
		expect(route).toBe("sql")
		expect(oracle.calls).toHaveLength(1)
		expect(oracle.calls[0].fields.question).toBe("Top 3 products by revenue?")
		expect(oracle.calls[0].prompt).toContain("Question: Top 3 products by revenue?")
	})

	it("falls back to hybrid when the oracle fails", async () => {
		const oracle = new ScriptedOracle()
		expect(await routeQuestion("anything", context(oracle))).toBe("hybrid")
	})
})

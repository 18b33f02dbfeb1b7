import { describe, it, expect, beforeAll, afterAll } from "vitest"
import * as fs from "fs"
import * as path from "path"
import { AnalystError } from "./config.js"
import { LexicalRetriever, extractTerms, splitIntoChunks } from "./retriever.js"
import { createCorpusFixture, makeTempDir, removeTempDir } from "./test_fixtures.js"

describe("splitIntoChunks", () => {
	it("splits at # and ## headers and numbers chunks from 0", () => {
		const chunks = splitIntoChunks("doc", "# A\ntext\n\n## B\nmore\n### C stays\nin B")
		expect(chunks).toEqual([
			{ id: "doc::chunk0", text: "# A\ntext", source: "doc" },
			{ id: "doc::chunk1", text: "## B\nmore\n### C stays\nin B", source: "doc" },
		])
	})

	it("counts skipped empty sections in the index", () => {
		const chunks = splitIntoChunks("doc", "\n## X\ny")
		expect(chunks.map(c => c.id)).toEqual(["doc::chunk1"])
	})

	it("handles CRLF line endings", () => {
		const chunks = splitIntoChunks("doc", "# A\r\none\r\n## B\r\ntwo")
		expect(chunks.map(c => c.text)).toEqual(["# A\none", "## B\ntwo"])
	})
})

describe("extractTerms", () => {
	it("lowercases, drops stop words and appends bigrams", () => {
		const terms = extractTerms("The Average Order Value", new Set(["the"]))
		expect(terms).toEqual(["average", "order", "value", "average order", "order value"])
	})

	it("ignores single-character tokens", () => {
		expect(extractTerms("a b cd", new Set())).toEqual(["cd"])
	})
})

describe("LexicalRetriever", () => {
	let tmpDir: string
	let retriever: LexicalRetriever

	beforeAll(() => {
		tmpDir = makeTempDir()
		retriever = LexicalRetriever.fromDirectory(createCorpusFixture(tmpDir))
	})

	afterAll(() => {
		removeTempDir(tmpDir)
	})

	it("indexes every header-delimited chunk of every document", () => {
		// kpi_definitions: 3, marketing_calendar: 3, product_policy: 1
		expect(retriever.size).toBe(7)
		expect(retriever.getChunk("marketing_calendar::chunk2")?.text).toContain("Winter Classics 1997")
		expect(retriever.getChunk("missing::chunk0")).toBeUndefined()
	})

	it("ranks the chunk sharing the query terms first", () => {
		const [top] = retriever.retrieve("winter classics", 3)
		expect(top.id).toBe("marketing_calendar::chunk2")
		expect(top.source).toBe("marketing_calendar")
		expect(top.relevance_score).toBeGreaterThan(0)
	})

	it("finds the policy document for a returns question", () => {
		const [top] = retriever.retrieve("Beverages returns policy", 3)
		expect(top.id).toBe("product_policy::chunk0")
	})

	it("returns at most k passages in descending score order within [0, 1]", () => {
		const passages = retriever.retrieve("average order value gross margin", 4)
		expect(passages).toHaveLength(4)
		for (let i = 0; i < passages.length; i++) {
			expect(passages[i].relevance_score).toBeGreaterThanOrEqual(0)
			expect(passages[i].relevance_score).toBeLessThanOrEqual(1)
			if (i > 0) expect(passages[i].relevance_score).toBeLessThanOrEqual(passages[i - 1].relevance_score)
		}
	})

	it("breaks ties by corpus order", () => {
		const passages = retriever.retrieve("zzzz qqqq", 3)
		expect(passages.map(p => p.id)).toEqual([
			"kpi_definitions::chunk0",
			"kpi_definitions::chunk1",
			"kpi_definitions::chunk2",
		])
		expect(passages.every(p => p.relevance_score === 0)).toBe(true)
	})

	it("returns nothing for k <= 0 and everything for a large k", () => {
		expect(retriever.retrieve("policy", 0)).toEqual([])
		expect(retriever.retrieve("policy", 50)).toHaveLength(7)
	})

	it("caps the vocabulary", () => {
		const small = LexicalRetriever.fromChunks(
			[{ id: "a::chunk0", text: "alpha beta gamma delta epsilon zeta", source: "a" }],
			{ maxFeatures: 5, stopWords: new Set() },
		)
		expect(small.vocabularySize).toBe(5)
	})

	it("fails construction when the corpus directory is missing", () => {
		expect(() => LexicalRetriever.fromDirectory(path.join(tmpDir, "nope"))).toThrow(AnalystError)
	})

	it("fails construction when the corpus yields no chunks", () => {
		const emptyDir = path.join(tmpDir, "empty")
		fs.mkdirSync(emptyDir)
		fs.writeFileSync(path.join(emptyDir, "notes.txt"), "not markdown")
		try {
			LexicalRetriever.fromDirectory(emptyDir)
			expect.unreachable()
		} catch (error) {
			expect(error).toBeInstanceOf(AnalystError)
			expect(error instanceof AnalystError && error.type).toBe("configuration")
		}
	})
})

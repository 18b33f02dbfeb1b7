/**
 * Lexical Retriever
 *
 * TF-IDF vector space over header-delimited chunks of a markdown corpus.
 * Unigrams and bigrams, lowercase, English stop words removed, vocabulary
 * capped to the most frequent terms. Queries are scored by cosine
 * similarity; ties keep corpus order.
 *
 * The index is built once and never mutated, so one retriever can serve
 * concurrent runs.
 */

import * as fs from "fs"
import * as path from "path"
import { fileURLToPath } from "url"
import { AnalystError, DEFAULTS, isRecord, type RetrievedPassage } from "./config.js"

// ============================================================================
// Types
// ============================================================================

export interface CorpusChunk {
	/** `{source}::chunk{index}` */
	id: string
	text: string
	source: string
}

export interface PassageRetriever {
	retrieve(query: string, k: number): RetrievedPassage[]
}

export interface RetrieverOptions {
	/** Vocabulary cap (most frequent terms across the corpus) */
	maxFeatures?: number
	stopWords?: ReadonlySet<string>
}

type SparseVector = Map<number, number>

// ============================================================================
// Stop words
// ============================================================================

let _stopWords: ReadonlySet<string> | null = null

/** Walk up from this module looking for data/<name> (works from src/ and dist/src/). */
function resolveDataFile(name: string): string {
	let dir = path.dirname(fileURLToPath(import.meta.url))
	for (let i = 0; i < 6; i++) {
		const candidate = path.join(dir, "data", name)
		if (fs.existsSync(candidate)) return candidate
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	throw new AnalystError("configuration", `Data file not found: data/${name}`)
}

export function englishStopWords(): ReadonlySet<string> {
	if (_stopWords) return _stopWords
	const parsed: unknown = JSON.parse(fs.readFileSync(resolveDataFile("stopwords.json"), "utf-8"))
	const words = isRecord(parsed) && Array.isArray(parsed.words) ? parsed.words : []
	_stopWords = new Set(words.filter((w): w is string => typeof w === "string"))
	return _stopWords
}

// ============================================================================
// Text processing
// ============================================================================

/** Lowercased unigrams (2+ word chars, stop words dropped) followed by their bigrams. */
export function extractTerms(text: string, stopWords: ReadonlySet<string>): string[] {
	const words = (text.toLowerCase().match(/[\p{L}\p{N}_]{2,}/gu) ?? []).filter(w => !stopWords.has(w))
	const terms = [...words]
	for (let i = 0; i + 1 < words.length; i++) {
		terms.push(`${words[i]} ${words[i + 1]}`)
	}
	return terms
}

/**
 * Split a markdown document at `#` / `##` header lines.
 * Chunk indexes count every section, so ids stay stable when blank
 * sections are skipped.
 */
export function splitIntoChunks(source: string, content: string): CorpusChunk[] {
	const sections = content.replace(/\r\n/g, "\n").split(/\n(?=##?\s)/)
	const chunks: CorpusChunk[] = []
	sections.forEach((section, index) => {
		const text = section.trim()
		if (!text) return
		chunks.push({ id: `${source}::chunk${index}`, text, source })
	})
	return chunks
}

function countTerms(terms: string[]): Map<string, number> {
	const counts = new Map<string, number>()
	for (const term of terms) {
		counts.set(term, (counts.get(term) ?? 0) + 1)
	}
	return counts
}

function l2Normalize(vector: SparseVector): SparseVector {
	let sumSquares = 0
	for (const value of vector.values()) sumSquares += value * value
	if (sumSquares === 0) return vector
	const norm = Math.sqrt(sumSquares)
	const normalized: SparseVector = new Map()
	for (const [index, value] of vector) normalized.set(index, value / norm)
	return normalized
}

// ============================================================================
// Retriever
// ============================================================================

export class LexicalRetriever implements PassageRetriever {
	private readonly stopWords: ReadonlySet<string>
	private readonly vocabulary = new Map<string, number>()
	private readonly idf: number[] = []
	private readonly vectors: SparseVector[]

	private constructor(private readonly chunks: CorpusChunk[], options: RetrieverOptions) {
		if (chunks.length === 0) {
			throw new AnalystError("configuration", "No documents loaded: corpus yielded zero chunks")
		}
		this.stopWords = options.stopWords ?? englishStopWords()
		const maxFeatures = options.maxFeatures ?? DEFAULTS.maxFeatures

		const chunkCounts = chunks.map(chunk => countTerms(extractTerms(chunk.text, this.stopWords)))

		// Vocabulary: most frequent terms across the corpus, ties alphabetical
		const totals = new Map<string, number>()
		const documentFrequency = new Map<string, number>()
		for (const counts of chunkCounts) {
			for (const [term, count] of counts) {
				totals.set(term, (totals.get(term) ?? 0) + count)
				documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1)
			}
		}
		const ranked = [...totals.entries()]
			.sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
			.slice(0, maxFeatures)
			.map(([term]) => term)
			.sort()

		// Smoothed idf: ln((1 + n) / (1 + df)) + 1
		const n = chunks.length
		ranked.forEach((term, index) => {
			this.vocabulary.set(term, index)
			this.idf.push(Math.log((1 + n) / (1 + (documentFrequency.get(term) ?? 0))) + 1)
		})

		this.vectors = chunkCounts.map(counts => this.weigh(counts))
	}

	/**
	 * Load every `*.md` file in a directory (sorted by name).
	 * Throws a configuration error when the directory is missing or empty.
	 */
	static fromDirectory(docsDir: string, options: RetrieverOptions = {}): LexicalRetriever {
		if (!fs.existsSync(docsDir) || !fs.statSync(docsDir).isDirectory()) {
			throw new AnalystError("configuration", `Documents directory not found: ${docsDir}`, false, { docsDir })
		}

		const files = fs.readdirSync(docsDir).filter(name => name.endsWith(".md")).sort()
		const chunks: CorpusChunk[] = []
		for (const file of files) {
			const content = fs.readFileSync(path.join(docsDir, file), "utf-8")
			chunks.push(...splitIntoChunks(path.basename(file, ".md"), content))
		}
		return new LexicalRetriever(chunks, options)
	}

	static fromChunks(chunks: CorpusChunk[], options: RetrieverOptions = {}): LexicalRetriever {
		return new LexicalRetriever([...chunks], options)
	}

	get size(): number {
		return this.chunks.length
	}

	get vocabularySize(): number {
		return this.vocabulary.size
	}

	/**
	 * Top-k chunks by cosine similarity, descending, ties in corpus order.
	 */
	retrieve(query: string, k: number): RetrievedPassage[] {
		if (k <= 0) return []
		const queryVector = this.weigh(countTerms(extractTerms(query, this.stopWords)))

		const scored = this.vectors.map((vector, index) => {
			let dot = 0
			for (const [term, weight] of queryVector) {
				dot += weight * (vector.get(term) ?? 0)
			}
			return { index, score: Math.min(1, Math.max(0, dot)) }
		})
		scored.sort((a, b) => b.score - a.score || a.index - b.index)

		return scored.slice(0, k).map(({ index, score }) => {
			const chunk = this.chunks[index]
			return { id: chunk.id, text: chunk.text, source: chunk.source, relevance_score: score }
		})
	}

	getChunk(id: string): CorpusChunk | undefined {
		return this.chunks.find(chunk => chunk.id === id)
	}

	private weigh(counts: Map<string, number>): SparseVector {
		const vector: SparseVector = new Map()
		for (const [term, count] of counts) {
			const index = this.vocabulary.get(term)
			if (index === undefined) continue
			vector.set(index, count * this.idf[index])
		}
		return l2Normalize(vector)
	}
}

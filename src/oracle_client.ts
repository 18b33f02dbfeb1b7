/**
 * Ollama HTTP Client
 *
 * Handles communication with the text-generation oracle.
 *
 * Responsibilities:
 * - Render the stage prompt and POST it to Ollama /api/generate
 * - Handle timeouts and transport errors as AnalystError
 * - Give stages a non-throwing entry point (invokeStage)
 */

import {
	AnalystError,
	errorMessage,
	isRecord,
	type Oracle,
	type OracleRequest,
	type OracleStage,
	type PipelineContext,
} from "./config.js"
import { renderPrompt } from "./prompts.js"

export interface OllamaOracleConfig {
	baseUrl: string
	model: string
	timeoutMs: number
	temperature: number
	maxTokens: number
}

export class OllamaOracle implements Oracle {
	private baseUrl: string

	constructor(private config: OllamaOracleConfig) {
		this.baseUrl = config.baseUrl.replace(/\/+$/, "")
	}

	async invoke(request: OracleRequest): Promise<string> {
		const url = `${this.baseUrl}/api/generate`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs)

		try {
			const response = await fetch(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify({
					model: this.config.model,
					prompt: request.prompt,
					stream: false,
					options: {
						temperature: this.config.temperature,
						num_predict: this.config.maxTokens,
					},
				}),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new AnalystError(
					"oracle",
					`Ollama returned error: ${response.status} ${errorText}`,
					response.status >= 500, // 5xx errors are recoverable
					{ statusCode: response.status, stage: request.stage },
				)
			}

			const data: unknown = await response.json()
			if (!isRecord(data) || typeof data.response !== "string") {
				throw new AnalystError("oracle", "Ollama reply has no response text", false, { stage: request.stage })
			}
			return data.response
		} catch (error) {
			if (error instanceof AnalystError) {
				throw error
			}

			if (error instanceof Error && error.name === "AbortError") {
				throw new AnalystError(
					"timeout",
					`Ollama request timed out after ${this.config.timeoutMs}ms`,
					true,
					{ timeout: this.config.timeoutMs, url },
				)
			}

			// fetch rejects with TypeError when the host is unreachable
			if (error instanceof TypeError) {
				throw new AnalystError(
					"oracle",
					`Cannot connect to Ollama at ${this.baseUrl}. Is it running?`,
					true,
					{ baseUrl: this.baseUrl, originalError: error.message },
				)
			}

			throw new AnalystError(
				"oracle",
				`Unexpected error communicating with Ollama: ${errorMessage(error)}`,
				false,
				{ originalError: String(error) },
			)
		} finally {
			clearTimeout(timeoutId)
		}
	}
}

// ============================================================================
// Stage entry point
// ============================================================================

export type OracleReply =
	| { ok: true; text: string }
	| { ok: false; error: string }

/**
 * Invoke the oracle for one stage. Transport failures come back as
 * `{ ok: false }` so each stage can apply its own fallback.
 */
export async function invokeStage(
	ctx: PipelineContext,
	stage: OracleStage,
	fields: Record<string, string>,
): Promise<OracleReply> {
	const request: OracleRequest = { stage, fields, prompt: renderPrompt(stage, fields) }
	const startTime = Date.now()
	try {
		const text = await ctx.oracle.invoke(request)
		ctx.logger.debug("Oracle replied", {
			run_id: ctx.run_id,
			stage,
			latency_ms: Date.now() - startTime,
			chars: text.length,
		})
		return { ok: true, text }
	} catch (error) {
		const message = errorMessage(error)
		ctx.logger.warn("Oracle call failed", { run_id: ctx.run_id, stage, error: message })
		return { ok: false, error: message }
	}
}

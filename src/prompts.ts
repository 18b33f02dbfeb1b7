/**
 * Prompt templates, one per oracle stage. `{name}` placeholders are filled
 * from the stage's prompt fields.
 */

import type { OracleStage } from "./config.js"

const TEMPLATES: Record<OracleStage, string> = {
	route: `Classify the question for a retail analytics assistant.
KPI calculations and questions that depend on policy or calendar documents need hybrid (docs+SQL).
Return only one word: rag, sql, or hybrid.

Question: {question}
Route:`,

	constraints: `Extract constraints for answering the question from the documents.
Return JSON with keys: date_range {start,end}, kpi_formula, categories, entities.

Question: {question}
Documents:
{documents}
Schema:
{schema}
Constraints (JSON):`,

	generate_sql: `Generate one SQLite query that answers the question.
MUST use "Order Details" with quotes. Use AS aliases. Use strftime for dates.

Schema:
{schema}
Constraints: {constraints}
Format hint: {format_hint}
Question: {question}
SQL:`,

	repair_sql: `The SQLite query below failed. Fix it.
MUST quote "Order Details". JOIN Orders for dates. Check all table names.

Schema:
{schema}
Failed query:
{original_query}
Error: {error_message}
Fixed SQL:`,

	synthesize: `Synthesize the final answer from the SQL results and documents.
Keep the reason under 100 characters.
Return JSON: {"answer": ..., "reason": "..."}

Question: {question}
Format hint: {format_hint}
SQL data: {sql_results}
Documents:
{documents}
Final answer (JSON):`,
}

export function renderPrompt(stage: OracleStage, fields: Record<string, string>): string {
	return TEMPLATES[stage].replace(/\{(\w+)\}/g, (placeholder, name: string) => fields[name] ?? placeholder)
}

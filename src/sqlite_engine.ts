/**
 * SQLite Engine
 *
 * Read-only access to the embedded analytics database. One connection is
 * opened per call and closed before returning. Execution never throws:
 * engine errors come back as `{ success: false, error }`.
 */

import * as fs from "fs"
import Database from "better-sqlite3"
import { AnalystError, DEFAULTS, errorMessage, isRecord, type CellValue } from "./config.js"

// ============================================================================
// Types
// ============================================================================

export interface EngineResult {
	success: boolean
	rows: CellValue[][]
	column_names: string[]
	error: string | null
}

export type QueryValidation = { valid: true } | { valid: false; error: string }

export interface RelationalEngine {
	execute(sql: string): Promise<EngineResult>
	/** Compact schema text with join hints and worked formula examples */
	describeSchema(): Promise<string>
	tableNames(): Promise<string[]>
}

export interface SqliteEngineOptions {
	/** Rows kept from a result set */
	maxRows?: number
	/** Tables described in the schema text */
	keyTables?: string[]
}

export const READ_ONLY_ERROR = "only read-only SELECT statements are allowed"

// ============================================================================
// Helpers
// ============================================================================

function toCellValue(value: unknown): CellValue {
	if (value === null || value === undefined) return null
	if (typeof value === "number" || typeof value === "string") return value
	if (typeof value === "bigint") return Number(value)
	if (value instanceof Uint8Array) return Buffer.from(value).toString("base64")
	return String(value)
}

function stringField(row: unknown, key: string): string | null {
	if (!isRecord(row)) return null
	const value = row[key]
	return typeof value === "string" ? value : null
}

export function quoteIdentifier(name: string): string {
	return name.includes(" ") ? `"${name}"` : name
}

// ============================================================================
// Engine
// ============================================================================

export class SqliteEngine implements RelationalEngine {
	private readonly maxRows: number
	private readonly keyTables: string[]
	private schemaText: string | null = null
	private tables: string[] | null = null

	constructor(private readonly dbPath: string, options: SqliteEngineOptions = {}) {
		if (!fs.existsSync(dbPath)) {
			throw new AnalystError("configuration", `Database not found: ${dbPath}`, false, { dbPath })
		}
		this.maxRows = options.maxRows ?? DEFAULTS.maxRows
		this.keyTables = options.keyTables ?? [...DEFAULTS.keyTables]
	}

	private open(): Database.Database {
		return new Database(this.dbPath, { readonly: true, fileMustExist: true })
	}

	async execute(sql: string): Promise<EngineResult> {
		let db: Database.Database | null = null
		try {
			db = this.open()
			const statement = db.prepare(sql)
			if (!statement.reader) {
				return { success: false, rows: [], column_names: [], error: READ_ONLY_ERROR }
			}

			const columnNames = statement.columns().map(column => column.name)
			const rows: CellValue[][] = []
			for (const row of statement.raw(true).iterate()) {
				if (rows.length >= this.maxRows) break
				rows.push(Array.isArray(row) ? row.map(toCellValue) : [toCellValue(row)])
			}
			return { success: true, rows, column_names: columnNames, error: null }
		} catch (error) {
			return { success: false, rows: [], column_names: [], error: errorMessage(error) }
		} finally {
			db?.close()
		}
	}

	/** Compile without running; the same read-only rule as `execute`. */
	async validateQuery(sql: string): Promise<QueryValidation> {
		let db: Database.Database | null = null
		try {
			db = this.open()
			const statement = db.prepare(sql)
			return statement.reader ? { valid: true } : { valid: false, error: READ_ONLY_ERROR }
		} catch (error) {
			return { valid: false, error: errorMessage(error) }
		} finally {
			db?.close()
		}
	}

	/** First `limit` rows of a known table. */
	async sampleTable(table: string, limit = 5): Promise<EngineResult> {
		if (!(await this.tableNames()).includes(table)) {
			return { success: false, rows: [], column_names: [], error: `no such table: ${table}` }
		}
		return this.execute(`SELECT * FROM ${quoteIdentifier(table)} LIMIT ${Math.max(0, Math.floor(limit))}`)
	}

	async tableNames(): Promise<string[]> {
		if (this.tables) return this.tables
		const db = this.open()
		try {
			this.tables = this.listTables(db)
			return this.tables
		} finally {
			db.close()
		}
	}

	/**
	 * Key tables with their first three columns, foreign-key join hints, and
	 * worked examples for date filters and the revenue, AOV and cost formulas.
	 */
	async describeSchema(): Promise<string> {
		if (this.schemaText !== null) return this.schemaText

		const db = this.open()
		try {
			const existing = this.listTables(db)
			const keyTables = this.keyTables.filter(table => existing.includes(table))
			const listed = keyTables
				.map(table => (table.includes(" ") ? `${quoteIdentifier(table)} (MUST quote!)` : table))
				.join(", ")

			const lines = [
				`Tables: ${listed}`,
				"Date: strftime('%Y-%m',Orders.OrderDate)='1997-06'. Revenue: SUM(UnitPrice*Quantity*(1-Discount))",
				"AOV: Revenue/COUNT(DISTINCT OrderID). CostOfGoods: 0.7*UnitPrice",
			]

			for (const table of keyTables) {
				const columns = db
					.prepare(`PRAGMA table_info(${quoteIdentifier(table)})`)
					.all()
					.map(row => stringField(row, "name"))
					.filter((name): name is string => name !== null)
				lines.push(`${quoteIdentifier(table)}(${columns.slice(0, 3).join(", ")}...)`)

				for (const fk of db.prepare(`PRAGMA foreign_key_list(${quoteIdentifier(table)})`).all()) {
					const target = stringField(fk, "table")
					const from = stringField(fk, "from")
					const to = stringField(fk, "to")
					if (target && from && to && keyTables.includes(target)) {
						lines.push(`  ${from}->${quoteIdentifier(target)}.${to}`)
					}
				}
			}

			this.schemaText = lines.join("\n")
			return this.schemaText
		} finally {
			db.close()
		}
	}

	private listTables(db: Database.Database): string[] {
		return db
			.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
			.all()
			.map(row => stringField(row, "name"))
			.filter((name): name is string => name !== null)
	}
}

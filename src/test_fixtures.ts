/**
 * Shared fixtures for tests: a small Northwind database in a temp file, a
 * temp markdown corpus and a scripted oracle.
 *
 * Revenue per product (UnitPrice * Quantity * (1 - Discount)):
 *   Chai 234, Ikura 217, Chang 85.5, Aniseed Syrup 40
 * Orders: 10248 (1996-07), 10249 (1997-06, 125.5), 10250 (1997-12, 289),
 *         10251 (1997-12, 72)
 */

import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import Database from "better-sqlite3"
import { AnalystError, type Oracle, type OracleRequest, type OracleStage } from "./config.js"

const SCHEMA = `
CREATE TABLE Categories (
	CategoryID INTEGER PRIMARY KEY,
	CategoryName TEXT NOT NULL,
	Description TEXT
);
CREATE TABLE Customers (
	CustomerID TEXT PRIMARY KEY,
	CompanyName TEXT NOT NULL,
	ContactName TEXT,
	Country TEXT
);
CREATE TABLE Products (
	ProductID INTEGER PRIMARY KEY,
	ProductName TEXT NOT NULL,
	SupplierID INTEGER,
	CategoryID INTEGER REFERENCES Categories(CategoryID),
	UnitPrice REAL
);
CREATE TABLE Orders (
	OrderID INTEGER PRIMARY KEY,
	CustomerID TEXT REFERENCES Customers(CustomerID),
	EmployeeID INTEGER,
	OrderDate TEXT
);
CREATE TABLE "Order Details" (
	OrderID INTEGER REFERENCES Orders(OrderID),
	ProductID INTEGER REFERENCES Products(ProductID),
	UnitPrice REAL,
	Quantity INTEGER,
	Discount REAL,
	PRIMARY KEY (OrderID, ProductID)
);
`

const DATA = `
INSERT INTO Categories VALUES (1, 'Beverages', 'Soft drinks, coffees, teas, beers, and ales');
INSERT INTO Categories VALUES (2, 'Condiments', 'Sweet and savory sauces');
INSERT INTO Categories VALUES (4, 'Dairy Products', 'Cheeses');
INSERT INTO Categories VALUES (8, 'Seafood', 'Seaweed and fish');

INSERT INTO Customers VALUES ('ALFKI', 'Alfreds Futterkiste', 'Maria Anders', 'Germany');
INSERT INTO Customers VALUES ('VINET', 'Vins et alcools Chevalier', 'Paul Henriot', 'France');

INSERT INTO Products VALUES (1, 'Chai', 1, 1, 18);
INSERT INTO Products VALUES (2, 'Chang', 1, 1, 19);
INSERT INTO Products VALUES (3, 'Aniseed Syrup', 1, 2, 10);
INSERT INTO Products VALUES (10, 'Ikura', 4, 8, 31);

INSERT INTO Orders VALUES (10248, 'VINET', 5, '1996-07-04 00:00:00');
INSERT INTO Orders VALUES (10249, 'ALFKI', 6, '1997-06-30 00:00:00');
INSERT INTO Orders VALUES (10250, 'VINET', 4, '1997-12-05 00:00:00');
INSERT INTO Orders VALUES (10251, 'ALFKI', 3, '1997-12-20 00:00:00');

INSERT INTO "Order Details" VALUES (10248, 1, 18, 5, 0);
INSERT INTO "Order Details" VALUES (10249, 2, 19, 5, 0.1);
INSERT INTO "Order Details" VALUES (10249, 3, 10, 4, 0);
INSERT INTO "Order Details" VALUES (10250, 10, 31, 7, 0);
INSERT INTO "Order Details" VALUES (10250, 1, 18, 4, 0);
INSERT INTO "Order Details" VALUES (10251, 1, 18, 4, 0);
`

export const FIXTURE_DOCS: Record<string, string> = {
	"marketing_calendar.md": [
		"# Northwind Marketing Calendar (1997)",
		"## Summer Beverages 1997",
		"- Dates: 1997-06-01 to 1997-06-30",
		"- Notes: Focus on Beverages and Condiments.",
		"## Winter Classics 1997",
		"- Dates: 1997-12-01 to 1997-12-31",
		"- Notes: Focus on Dairy Products and Confections for holiday gifting.",
	].join("\n"),
	"kpi_definitions.md": [
		"# KPI Definitions",
		"## Average Order Value (AOV)",
		"- AOV = SUM(UnitPrice * Quantity * (1 - Discount)) / COUNT(DISTINCT OrderID)",
		"## Gross Margin",
		"- GM = SUM((UnitPrice - CostOfGoods) * Quantity * (1 - Discount))",
	].join("\n"),
	"product_policy.md": [
		"# Returns & Policy",
		"- Perishables (Produce, Seafood, Dairy Products): 3-5 days.",
		"- Beverages unopened: 14 days; opened: no returns.",
	].join("\n"),
}

export function makeTempDir(prefix = "analyst-test-"): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

export function removeTempDir(dir: string): void {
	fs.rmSync(dir, { recursive: true, force: true })
}

/** Build the fixture database in `dir` and return its path. */
export function createNorthwindFixture(dir: string): string {
	const dbPath = path.join(dir, "northwind.sqlite")
	const db = new Database(dbPath)
	try {
		db.exec(SCHEMA)
		db.exec(DATA)
	} finally {
		db.close()
	}
	return dbPath
}

/** Write the fixture corpus under `dir/docs` and return that directory. */
export function createCorpusFixture(dir: string, docs: Record<string, string> = FIXTURE_DOCS): string {
	const docsDir = path.join(dir, "docs")
	fs.mkdirSync(docsDir, { recursive: true })
	for (const [name, content] of Object.entries(docs)) {
		fs.writeFileSync(path.join(docsDir, name), content)
	}
	return docsDir
}

/**
 * Oracle that replays scripted replies per stage. Each call takes the next
 * reply; the last one repeats once the queue is down to it. A stage with no
 * script fails like an unreachable provider.
 */
export class ScriptedOracle implements Oracle {
	readonly calls: OracleRequest[] = []
	private readonly queues = new Map<OracleStage, string[]>()

	constructor(script: Partial<Record<OracleStage, string | string[]>> = {}) {
		for (const [stage, replies] of Object.entries(script)) {
			if (replies === undefined || !isStage(stage)) continue
			this.queues.set(stage, Array.isArray(replies) ? [...replies] : [replies])
		}
	}

	async invoke(request: OracleRequest): Promise<string> {
		this.calls.push(request)
		const queue = this.queues.get(request.stage)
		if (!queue || queue.length === 0) {
			throw new AnalystError("oracle", `No scripted reply for ${request.stage}`, true)
		}
		return queue.length > 1 ? (queue.shift() ?? "") : queue[0]
	}

	callsFor(stage: OracleStage): OracleRequest[] {
		return this.calls.filter(call => call.stage === stage)
	}
}

const STAGES: readonly OracleStage[] = ["route", "constraints", "generate_sql", "repair_sql", "synthesize"]

function isStage(value: string): value is OracleStage {
	return STAGES.some(stage => stage === value)
}

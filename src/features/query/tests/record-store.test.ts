/**
 * Tests for the SQLite record store and executeQuery().
 *
 * Builds the sample project's store in a temp directory, then runs built
 * queries against it.
 */
import { rmSync, existsSync } from "node:fs";
import { join } from "node:path";
import { loadLookupProject } from "../../../shared/loader.js";
import { ExecutionError, NotFoundError } from "../../../shared/errors.js";
import type { RecordRow } from "../../../shared/types/lookup.js";
import { makeTempRoot, writeSampleProject } from "../../../shared/tests/fixture.js";
import { buildStore } from "../../pipeline/store-builder.js";
import { buildQuery, buildRecordDetailsQuery } from "../query-builder.js";
import { executeQuery, SqliteRecordStore, type RecordQueryExecutor } from "../record-store.js";

// ── Fixture setup ─────────────────────────────────────────────────────

const ROOT = makeTempRoot("store-test");
writeSampleProject(ROOT);
const project = loadLookupProject({ root: ROOT });
const DB_PATH = join(ROOT, ".rlk", "store", "records.db");
const built = buildStore(project, { root: ROOT });
const store = new SqliteRecordStore({ dbPath: DB_PATH, catalog: project.catalog });

// ── Helpers ───────────────────────────────────────────────────────────

let passed = 0;
let failed = 0;

function assert(label: string, condition: boolean, detail?: string) {
  if (condition) {
    console.log(`  OK: ${label}`);
    passed++;
  } else {
    console.error(`FAIL: ${label}${detail ? ` — ${detail}` : ""}`);
    failed++;
  }
}

function ids(rows: RecordRow[]): string {
  return rows.map((r) => r.Id).join(",");
}

async function failure(run: () => Promise<unknown>): Promise<unknown> {
  try {
    await run();
    return null;
  } catch (err: unknown) {
    return err;
  }
}

// ── Tests ─────────────────────────────────────────────────────────────

function testBuild() {
  console.log("\n--- store build ---");
  assert("database written", existsSync(DB_PATH));
  assert("default path under .rlk/store", built.dbPath === DB_PATH, built.dbPath);
  assert("account rows", built.tables.Account === 6, JSON.stringify(built.tables));
  assert("entity without records gets an empty table", built.tables.AccountHistory === 0);
}

async function testSearch() {
  console.log("\n--- search ---");
  const spec = buildQuery({ entityType: "Account", fields: ["Name", "Industry", "Owner.Name"], searchTerm: "acme" });
  const rows = await executeQuery(store, spec);

  assert("case-insensitive match, ordered by name", ids(rows) === "001,002", ids(rows));
  assert("relationship column joined", rows[0]?.["Owner.Name"] === "Dana Example", String(rows[0]?.["Owner.Name"]));
  assert("second owner", rows[1]?.["Owner.Name"] === "Sam Placeholder");
  assert("only projected fields", JSON.stringify(Object.keys(rows[0] ?? {})) === '["Id","Name","Industry","Owner.Name"]');

  const owner = buildQuery({ entityType: "Account", fields: ["Name", "Owner.Name"], searchTerm: "placeholder" });
  const byOwner = await executeQuery(store, owner);
  assert("matches on the related name", ids(byOwner) === "005,002", ids(byOwner));
}

async function testOrderingAndCap() {
  console.log("\n--- ordering and cap ---");
  const all = await executeQuery(store, buildQuery({ entityType: "Account", fields: ["Name"] }));
  assert("unfiltered, case-insensitive order", ids(all) === "005,001,002,003,004,006", ids(all));

  const two = await executeQuery(store, buildQuery({ entityType: "Account", fields: ["Name"], cap: 2 }));
  assert("cap respected", ids(two) === "005,001", ids(two));
}

async function testWildcardsAndQuotes() {
  console.log("\n--- wildcards and quotes ---");
  const underscore = await executeQuery(
    store,
    buildQuery({ entityType: "Account", fields: ["Name", "Industry"], searchTerm: "_" }),
  );
  assert("underscore is literal", ids(underscore) === "004", ids(underscore));

  const percent = await executeQuery(store, buildQuery({ entityType: "Account", fields: ["Name"], searchTerm: "100%" }));
  assert("percent is literal", ids(percent) === "005", ids(percent));

  const quote = await executeQuery(store, buildQuery({ entityType: "Account", fields: ["Name"], searchTerm: "o'brien" }));
  assert("quote in term", ids(quote) === "006", ids(quote));
}

async function testNonAsciiCase() {
  console.log("\n--- non-ASCII case folding ---");
  const root = makeTempRoot("store-accents");
  try {
    writeSampleProject(root, {
      "records/User.yml": [
        "records:",
        '  - { Id: "005A", Name: "Dana Example", Email: "dana@example.com" }',
        '  - { Id: "005C", Name: "Émile Zola", Email: "emile@example.com" }',
        "",
      ].join("\n"),
    });
    const users = loadLookupProject({ root });
    const { dbPath } = buildStore(users, { root });
    const accents = new SqliteRecordStore({ dbPath, catalog: users.catalog });

    for (const term of ["Émile", "émile", "ÉMILE", "zola"]) {
      const rows = await executeQuery(accents, buildQuery({ entityType: "User", fields: ["Name"], searchTerm: term }));
      assert(`"${term}" matches Émile Zola`, ids(rows) === "005C", ids(rows));
    }
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
}

async function testValues() {
  console.log("\n--- value types ---");
  const spec = buildRecordDetailsQuery(
    "Account",
    ["002", "004"],
    ["Name", "Phone", "IsActive", "AnnualRevenue", "NumberOfEmployees", "Owner.Name"],
  );
  const rows = await executeQuery(store, spec);
  const labs = rows.find((r) => r.Id === "002");
  const initech = rows.find((r) => r.Id === "004");

  assert("details by id", ids(rows) === "002,004", ids(rows));
  assert("null stays null", labs?.Phone === null);
  assert("boolean restored", labs?.IsActive === false && initech?.IsActive === false);
  assert("number kept", labs?.AnnualRevenue === 250000 && labs.NumberOfEmployees === 15);
  assert("missing reference joins to null", initech?.["Owner.Name"] === null);

  const active = await executeQuery(
    store,
    buildQuery({ entityType: "Account", fields: ["Name", "IsActive"], extraFilter: "IsActive = 1" }),
  );
  assert("extra filter applied", ids(active) === "005,001,003", ids(active));
  assert("true restored", active.every((r) => r.IsActive === true));
}

async function testFailures() {
  console.log("\n--- failures ---");
  const unknownEntity = await failure(() =>
    executeQuery(store, buildQuery({ entityType: "Opportunity", fields: ["Name"] })),
  );
  assert("unknown entity wrapped", unknownEntity instanceof ExecutionError);
  assert(
    "unknown entity keeps message",
    unknownEntity instanceof Error && unknownEntity.message === 'Unknown entity type "Opportunity"',
  );
  assert("cause kept", unknownEntity instanceof Error && unknownEntity.cause instanceof NotFoundError);

  const unknownColumn = await failure(() =>
    executeQuery(store, buildQuery({ entityType: "Account", fields: ["Nonexistent"] })),
  );
  assert(
    "unknown column reported",
    unknownColumn instanceof ExecutionError && unknownColumn.message.includes("no such column"),
    String(unknownColumn),
  );

  const unknownPath = await failure(() =>
    executeQuery(store, buildQuery({ entityType: "Account", fields: ["Parent.Name"] })),
  );
  assert(
    "unknown relationship reported",
    unknownPath instanceof ExecutionError && unknownPath.message === 'Unknown field "Parent.Name" on Account',
  );

  const broken: RecordQueryExecutor = {
    execute: () => Promise.reject(new Error("connection refused")),
  };
  const wrapped = await failure(() => executeQuery(broken, buildQuery({ entityType: "Account", fields: ["Name"] })));
  assert("any executor failure wrapped once", wrapped instanceof ExecutionError && wrapped.message === "connection refused");
}

// ── Run all ───────────────────────────────────────────────────────────

try {
  testBuild();
  await testSearch();
  await testOrderingAndCap();
  await testWildcardsAndQuotes();
  await testNonAsciiCase();
  await testValues();
  await testFailures();
} finally {
  rmSync(ROOT, { recursive: true, force: true });
}

// ── Summary ───────────────────────────────────────────────────────────
console.log(`\n${"=".repeat(40)}`);
console.log(`Results: ${passed} passed, ${failed} failed`);
if (failed > 0) process.exit(1);

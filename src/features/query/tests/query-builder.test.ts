/**
 * Tests for the query builder and the query dialects.
 */
import { ValidationError } from "../../../shared/errors.js";
import {
  buildQuery,
  buildRecordDetailsQuery,
  resolveCap,
  DEFAULT_RESULTS,
  MAX_RESULTS,
} from "../query-builder.js";
import { containsText, renderCondition, sqliteDialect } from "../dialect.js";

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

function throwsValidation(fn: () => unknown): boolean {
  try {
    fn();
    return false;
  } catch (err: unknown) {
    return err instanceof ValidationError;
  }
}

// ── Tests ─────────────────────────────────────────────────────────────

function testSearchQuery() {
  console.log("\n--- search query ---");
  const spec = buildQuery({ entityType: "Account", fields: ["Name", "Industry"], searchTerm: "Acme", cap: 100 });

  assert("limit clamped to 50", spec.limit === 50, `got ${spec.limit}`);
  assert("Id appended", JSON.stringify(spec.fields) === '["Name","Industry","Id"]', JSON.stringify(spec.fields));
  assert(
    "where ORs a match per field",
    spec.where === "(Name LIKE '%Acme%' OR Industry LIKE '%Acme%')",
    spec.where,
  );
  assert(
    "full query text",
    spec.query ===
      "SELECT Name, Industry, Id FROM Account WHERE (Name LIKE '%Acme%' OR Industry LIKE '%Acme%') ORDER BY Name ASC LIMIT 50",
    spec.query,
  );
  assert("ordered by first field", spec.orderBy === "Name");
  assert("search fields exclude Id", JSON.stringify(spec.condition.search?.fields) === '["Name","Industry"]');
}

function testBlankTerm() {
  console.log("\n--- blank term ---");
  for (const term of [undefined, "", "   "]) {
    const spec = buildQuery({ entityType: "Account", fields: ["Name"], searchTerm: term });
    assert(`no condition for ${JSON.stringify(term)}`, spec.where === "" && spec.condition.search === undefined);
    assert(
      `unfiltered query for ${JSON.stringify(term)}`,
      spec.query === "SELECT Name, Id FROM Account ORDER BY Name ASC LIMIT 10",
      spec.query,
    );
  }

  const trimmed = buildQuery({ entityType: "Account", fields: ["Name"], searchTerm: "  acme  " });
  assert("term trimmed", trimmed.where === "(Name LIKE '%acme%')", trimmed.where);
}

function testFieldProjection() {
  console.log("\n--- field projection ---");
  const lowerId = buildQuery({ entityType: "Account", fields: ["id", "Name"] });
  assert("id projected once, canonical spelling", JSON.stringify(lowerId.fields) === '["Id","Name"]', JSON.stringify(lowerId.fields));
  assert("order by skips Id", lowerId.orderBy === "Name");

  const dupes = buildQuery({ entityType: "Account", fields: ["Name", "name", " Name "] });
  assert("case-insensitive dedupe", JSON.stringify(dupes.fields) === '["Name","Id"]', JSON.stringify(dupes.fields));

  const blanks = buildQuery({ entityType: "Account", fields: ["", "Name", "  "] });
  assert("blank entries dropped", JSON.stringify(blanks.fields) === '["Name","Id"]');

  const related = buildQuery({ entityType: "Account", fields: ["Owner.Name"], searchTerm: "dana" });
  assert("relationship path kept", related.where === "(Owner.Name LIKE '%dana%')", related.where);

  const onlyId = buildQuery({ entityType: "Account", fields: ["Id"], searchTerm: "x" });
  assert("term ignored without searchable fields", onlyId.where === "", onlyId.where);
  assert("ordered by Id", onlyId.orderBy === "Id");
}

function testValidation() {
  console.log("\n--- validation ---");
  assert("blank entity", throwsValidation(() => buildQuery({ entityType: "", fields: ["Name"] })));
  assert("whitespace entity", throwsValidation(() => buildQuery({ entityType: "  ", fields: ["Name"] })));
  assert("empty fields", throwsValidation(() => buildQuery({ entityType: "Account", fields: [] })));
  assert("only blank fields", throwsValidation(() => buildQuery({ entityType: "Account", fields: ["", " "] })));
  assert("injected entity", throwsValidation(() => buildQuery({ entityType: "Account; DROP", fields: ["Name"] })));
  assert("injected field", throwsValidation(() => buildQuery({ entityType: "Account", fields: ["Name, Secret"] })));
  assert("two hops rejected", throwsValidation(() => buildQuery({ entityType: "Account", fields: ["Owner.Manager.Name"] })));
}

function testCap() {
  console.log("\n--- cap ---");
  const cases: Array<[number | undefined, number]> = [
    [undefined, DEFAULT_RESULTS],
    [0, 1],
    [-5, 1],
    [7.9, 7],
    [50, 50],
    [51, MAX_RESULTS],
    [Number.NaN, DEFAULT_RESULTS],
    [1e9, MAX_RESULTS],
    [Number.POSITIVE_INFINITY, MAX_RESULTS],
    [Number.NEGATIVE_INFINITY, 1],
  ];
  for (const [requested, expected] of cases) {
    const got = resolveCap(requested);
    assert(`cap ${requested} → ${expected}`, got === expected, `got ${got}`);
  }

  const unbounded = buildQuery({ entityType: "Account", fields: ["Name"], cap: Number.POSITIVE_INFINITY });
  assert("unbounded cap → LIMIT 50", unbounded.limit === MAX_RESULTS && unbounded.query.endsWith(" LIMIT 50"), unbounded.query);
}

function testEscaping() {
  console.log("\n--- escaping ---");
  const quote = buildQuery({ entityType: "Account", fields: ["Name"], searchTerm: "O'Brien" });
  assert("quote escaped", quote.where === "(Name LIKE '%O\\'Brien%')", quote.where);

  const wild = buildQuery({ entityType: "Account", fields: ["Name"], searchTerm: "50%_off\\" });
  assert("wildcards and backslash escaped once", wild.where === "(Name LIKE '%50\\%\\_off\\\\%')", wild.where);

  const sqlite = renderCondition({ search: { term: "a_b%", fields: ["Owner.Name", "Name"] } }, sqliteDialect);
  assert(
    "sqlite: contains function over quoted paths",
    sqlite === `(rlk_contains("Owner.Name", 'a_b%') OR rlk_contains("Name", 'a_b%'))`,
    sqlite,
  );

  const plain = renderCondition({ search: { term: "it's", fields: ["Name"] } }, sqliteDialect);
  assert("sqlite: doubled quote", plain === `(rlk_contains("Name", 'it''s'))`, plain);
}

function testContainsText() {
  console.log("\n--- containsText ---");
  assert("ASCII case folded", containsText("Acme Corp", "ACME") === 1);
  assert("non-ASCII case folded", containsText("Émile Zola", "émile") === 1);
  assert("wildcards are literal", containsText("50% off", "0%") === 1 && containsText("500 off", "0%") === 0);
  assert("numbers compared as text", containsText(5000000, "500") === 1);
  assert("null never matches", containsText(null, "") === 0);
  assert("no match", containsText("Globex", "acme") === 0);
}

function testExtraFilter() {
  console.log("\n--- extra filter ---");
  const spec = buildQuery({
    entityType: "Account",
    fields: ["Name"],
    searchTerm: "Acme",
    extraFilter: "Industry = 'Technology'",
  });
  assert(
    "filter AND-ed as its own group",
    spec.where === "(Name LIKE '%Acme%') AND (Industry = 'Technology')",
    spec.where,
  );

  const alone = buildQuery({ entityType: "Account", fields: ["Name"], extraFilter: "  " });
  assert("blank filter ignored", alone.where === "");
}

function testRecordDetails() {
  console.log("\n--- record details ---");
  const spec = buildRecordDetailsQuery("Account", ["001", " ", "002", "001"], ["Name"]);
  assert("ids deduplicated", JSON.stringify(spec.condition.ids) === '["001","002"]');
  assert("limit is id count", spec.limit === 2, `got ${spec.limit}`);
  assert("Id IN condition", spec.where === "Id IN ('001', '002')", spec.where);

  const sqlite = renderCondition(spec.condition, sqliteDialect);
  assert("sqlite Id IN", sqlite === `"Id" IN ('001', '002')`, sqlite);

  assert("no ids", throwsValidation(() => buildRecordDetailsQuery("Account", ["", " "], ["Name"])));
}

function testPurity() {
  console.log("\n--- purity ---");
  const request = { entityType: "Account", fields: ["Name", "Industry"], searchTerm: "Acme" };
  const a = buildQuery(request);
  const b = buildQuery(request);
  assert("same input, same output", JSON.stringify(a) === JSON.stringify(b));
  assert("request untouched", JSON.stringify(request.fields) === '["Name","Industry"]');
}

// ── Run all ───────────────────────────────────────────────────────────

testSearchQuery();
testBlankTerm();
testFieldProjection();
testValidation();
testCap();
testEscaping();
testContainsText();
testExtraFilter();
testRecordDetails();
testPurity();

// ── Summary ───────────────────────────────────────────────────────────
console.log(`\n${"=".repeat(40)}`);
console.log(`Results: ${passed} passed, ${failed} failed`);
if (failed > 0) process.exit(1);

/**
 * Sample `.rlk/` project shared by the test scripts.
 *
 * Accounts (ordered by name, case-insensitive):
 *   005 "100% Juice Co", 001 "Acme Corp", 002 "Acme Labs",
 *   003 "Globex", 004 "Initech_Systems", 006 "O'Brien Partners"
 */
import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";

export const SAMPLE_FILES: Record<string, string> = {
  "catalog/Account.yml": [
    "name: Account",
    "label: Account",
    "fields:",
    "  - { name: Name, label: Account Name, type: string }",
    "  - { name: Industry, label: Industry, type: picklist }",
    "  - { name: Phone, label: Phone, type: phone }",
    "  - { name: AnnualRevenue, label: Annual Revenue, type: currency }",
    "  - { name: IsActive, label: Active, type: boolean }",
    "  - { name: OwnerId, label: Owner ID, type: reference, referenceTo: User }",
    "  - { name: NumberOfEmployees, label: Employees, type: int }",
    "",
  ].join("\n"),
  "catalog/User.yml": [
    "name: User",
    "label: User",
    "fields:",
    "  - { name: Name, label: Full Name, type: string }",
    "  - { name: Email, label: Email, type: email }",
    "",
  ].join("\n"),
  "catalog/Contact.yml": [
    "name: Contact",
    "label: Contact",
    "nameField: LastName",
    "fields:",
    "  - { name: LastName, label: Last Name, type: string }",
    "  - { name: Email, label: Email, type: email }",
    "  - { name: AccountId, label: Account ID, type: reference, referenceTo: Account }",
    "",
  ].join("\n"),
  "catalog/AccountHistory.yml": [
    "name: AccountHistory",
    "label: Account History",
    "fields:",
    "  - { name: Field, label: Field, type: string }",
    "",
  ].join("\n"),
  "records/Account.yml": [
    "records:",
    '  - { Id: "001", Name: "Acme Corp", Industry: Technology, Phone: "555-0001", AnnualRevenue: 5000000, IsActive: true, OwnerId: "005A", NumberOfEmployees: 120 }',
    '  - { Id: "002", Name: "Acme Labs", Industry: Biotech, Phone: null, AnnualRevenue: 250000, IsActive: false, OwnerId: "005B", NumberOfEmployees: 15 }',
    '  - { Id: "003", Name: "Globex", Industry: Manufacturing, Phone: "555-0003", AnnualRevenue: 9000000, IsActive: true, OwnerId: "005A", NumberOfEmployees: 800 }',
    '  - { Id: "004", Name: "Initech_Systems", Industry: Technology, Phone: "555-0004", AnnualRevenue: 100, IsActive: false, NumberOfEmployees: 5 }',
    '  - { Id: "005", Name: "100% Juice Co", Industry: Food, Phone: "555-0005", AnnualRevenue: 42000, IsActive: true, OwnerId: "005B", NumberOfEmployees: 9 }',
    '  - { Id: "006", Name: "O\'Brien Partners", Industry: Consulting, Phone: "555-0006", AnnualRevenue: 780000, IsActive: false, OwnerId: "005A", NumberOfEmployees: 30 }',
    "",
  ].join("\n"),
  "records/User.yml": [
    "records:",
    '  - { Id: "005A", Name: "Dana Example", Email: "dana@example.com" }',
    '  - { Id: "005B", Name: "Sam Placeholder", Email: "sam@example.com" }',
    "",
  ].join("\n"),
  "records/Contact.yml": [
    "records:",
    '  - { Id: "003A", LastName: "Rivera", Email: "rivera@example.com", AccountId: "001" }',
    "",
  ].join("\n"),
  "lookup.yml": [
    "entityType: Account",
    "primaryField: Name",
    "secondaryFields: [Industry, Owner.Name]",
    "tertiaryFields: [Phone]",
    "allowMultipleSelection: false",
    "displayFormat: pills",
    "placeholder: Search accounts...",
    "selectedRecordsTitle: Selected Accounts",
    "",
  ].join("\n"),
};

/** Create an empty temp root and return its path. */
export function makeTempRoot(suffix: string): string {
  const root = join(tmpdir(), `rlk-${suffix}-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
  mkdirSync(root, { recursive: true });
  return root;
}

/**
 * Write the sample project under `<root>/.rlk/`. `overrides` replaces or
 * adds files by path relative to `.rlk/`; a `null` value leaves the file out.
 */
export function writeSampleProject(root: string, overrides: Record<string, string | null> = {}): void {
  const files: Record<string, string | null> = { ...SAMPLE_FILES, ...overrides };
  for (const [rel, content] of Object.entries(files)) {
    if (content === null) continue;
    const file = join(root, ".rlk", rel);
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, content, "utf-8");
  }
}

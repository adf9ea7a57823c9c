import type { Logger } from "@destruction/observability";

import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import type { Warehouse } from "./index.js";

// Participant registry concept ids. Both flags must read "Yes" before derived rows may go.
export const DESTROY_REQUESTED_FIELD = "d_831041022";
export const DESTROY_COMPLETED_FIELD = "d_861639549";
export const FLAG_YES = "353358909";

export type BatchViolation = {
  statement: number;
  rule: "empty_script" | "cte" | "table_ddl" | "not_delete" | "flag_disjunction" | "missing_destroy_requested" | "missing_destroy_completed";
  message: string;
};

export function defaultBatchScriptPath() {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  return path.join(__dirname, "..", "sql", "participant_destruction.sql");
}

export async function loadBatchScript(file?: string) {
  return fs.readFile(file ?? defaultBatchScriptPath(), "utf8");
}

function isQuote(ch: string) {
  return ch === "'" || ch === '"' || ch === "`";
}

// Index just past the literal opening at `start`; a backslash escapes the next character.
function literalEnd(sql: string, start: number) {
  const quote = sql.charAt(start);
  let i = start + 1;
  while (i < sql.length) {
    const ch = sql.charAt(i);
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === quote) return i + 1;
    i += 1;
  }
  return sql.length;
}

function stripComments(sql: string) {
  let out = "";
  let i = 0;
  while (i < sql.length) {
    const ch = sql.charAt(i);
    const next = sql.charAt(i + 1);
    if (isQuote(ch)) {
      const stop = literalEnd(sql, i);
      out += sql.slice(i, stop);
      i = stop;
      continue;
    }
    if (ch === "-" && next === "-") {
      const end = sql.indexOf("\n", i);
      i = end === -1 ? sql.length : end;
      continue;
    }
    if (ch === "/" && next === "*") {
      const end = sql.indexOf("*/", i + 2);
      i = end === -1 ? sql.length : end + 2;
      out += " ";
      continue;
    }
    out += ch;
    i += 1;
  }
  return out;
}

/** Splits a script into statements with comments removed and whitespace collapsed. */
export function splitStatements(sql: string) {
  const body = stripComments(sql);
  const statements: string[] = [];
  let current = "";
  let i = 0;
  while (i < body.length) {
    const ch = body.charAt(i);
    if (isQuote(ch)) {
      const stop = literalEnd(body, i);
      current += body.slice(i, stop);
      i = stop;
      continue;
    }
    if (ch === ";") {
      statements.push(current);
      current = "";
    } else {
      current += ch;
    }
    i += 1;
  }
  statements.push(current);
  return statements.map((s) => s.replace(/\s+/g, " ").trim()).filter(Boolean);
}

function blankLiterals(stmt: string) {
  let out = "";
  let i = 0;
  while (i < stmt.length) {
    const ch = stmt.charAt(i);
    if (isQuote(ch)) {
      i = literalEnd(stmt, i);
      out += ch + ch;
      continue;
    }
    out += ch;
    i += 1;
  }
  return out;
}

function flagCondition(field: string) {
  return new RegExp(`\\b${field}\\s*=\\s*'${FLAG_YES}'`, "i");
}

export function checkBatchScript(sql: string): BatchViolation[] {
  const statements = splitStatements(sql);
  if (!statements.length) {
    return [{ statement: 0, rule: "empty_script", message: "script contains no statements" }];
  }

  const violations: BatchViolation[] = [];
  statements.forEach((stmt, idx) => {
    const statement = idx + 1;
    if (/^with\b/i.test(stmt)) {
      violations.push({ statement, rule: "cte", message: `statement ${statement} wraps its target in a common table expression` });
      return;
    }
    if (/\b(create|drop)\b(\s+or\s+replace)?(\s+temp|\s+temporary)?\s+table\b/i.test(stmt)) {
      violations.push({ statement, rule: "table_ddl", message: `statement ${statement} creates or drops a table` });
      return;
    }
    if (!/^delete\b/i.test(stmt)) {
      violations.push({ statement, rule: "not_delete", message: `statement ${statement} is not a DELETE` });
      return;
    }
    // Only conjunctions: an OR or NOT could let a row through with just one flag set.
    if (/\b(or|not)\b/i.test(blankLiterals(stmt))) {
      violations.push({
        statement,
        rule: "flag_disjunction",
        message: `statement ${statement} uses OR or NOT; both destruction flags must be required together`
      });
    }
    if (!flagCondition(DESTROY_REQUESTED_FIELD).test(stmt)) {
      violations.push({
        statement,
        rule: "missing_destroy_requested",
        message: `statement ${statement} does not require ${DESTROY_REQUESTED_FIELD} = '${FLAG_YES}'`
      });
    }
    if (!flagCondition(DESTROY_COMPLETED_FIELD).test(stmt)) {
      violations.push({
        statement,
        rule: "missing_destroy_completed",
        message: `statement ${statement} does not require ${DESTROY_COMPLETED_FIELD} = '${FLAG_YES}'`
      });
    }
  });
  return violations;
}

export async function runBatchDestruction(opts: { warehouse: Pick<Warehouse, "runStatement">; logger: Logger; sql: string }) {
  const violations = checkBatchScript(opts.sql);
  if (violations.length) {
    throw new Error(`Batch script rejected: ${violations.map((v) => v.message).join("; ")}`);
  }

  const statements = splitStatements(opts.sql);
  for (const [idx, stmt] of statements.entries()) {
    opts.logger.info({ statement: idx + 1, of: statements.length }, "running destruction statement");
    await opts.warehouse.runStatement(stmt);
  }
  opts.logger.info({ statements: statements.length }, "batch destruction completed");
  return { statements: statements.length };
}

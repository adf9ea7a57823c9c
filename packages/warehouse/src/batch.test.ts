import assert from "node:assert/strict";
import test from "node:test";

import { createLogger } from "@destruction/observability";

import { checkBatchScript, loadBatchScript, runBatchDestruction, splitStatements } from "./batch.js";

const logger = createLogger({ service: "batch-test", level: "silent" });

const GUARDED_DELETE = `
DELETE FROM Derived.steps
WHERE Connect_ID IN (
  SELECT Connect_ID FROM FlatConnect.participants_JP
  WHERE d_831041022 = '353358909' AND d_861639549 = '353358909'
)`;

void test("shipped batch script passes the scheduling checks", async () => {
  const sql = await loadBatchScript();
  assert.deepEqual(checkBatchScript(sql), []);
  const statements = splitStatements(sql);
  assert.equal(statements.length, 1);
  assert.equal(
    statements[0],
    "DELETE FROM ForTestingOnly.roi_physical_activity WHERE Connect_ID IN ( SELECT Connect_ID FROM FlatConnect.participants_JP WHERE d_831041022 = '353358909' AND d_861639549 = '353358909' )"
  );
});

void test("splitStatements drops comments but keeps quoted text", () => {
  const sql = "-- header\nDELETE FROM a.b WHERE x = 'a;b -- not a comment'; /* block; */ DELETE FROM c.d WHERE y = 1;";
  assert.deepEqual(splitStatements(sql), ["DELETE FROM a.b WHERE x = 'a;b -- not a comment'", "DELETE FROM c.d WHERE y = 1"]);
});

void test("splitStatements honours backslash escapes inside literals", () => {
  const sql = "DELETE FROM a.b WHERE x = 'it\\'s; -- still text' AND y = \"q\\\"; z\"; DELETE FROM c.d WHERE y = 1";
  assert.deepEqual(splitStatements(sql), ["DELETE FROM a.b WHERE x = 'it\\'s; -- still text' AND y = \"q\\\"; z\"", "DELETE FROM c.d WHERE y = 1"]);
});

void test("checkBatchScript rejects an empty script", () => {
  assert.deepEqual(checkBatchScript("-- nothing here\n"), [{ statement: 0, rule: "empty_script", message: "script contains no statements" }]);
});

void test("checkBatchScript rejects a CTE wrapping the delete", () => {
  const sql = `WITH doomed AS (SELECT Connect_ID FROM FlatConnect.participants_JP) DELETE FROM Derived.steps WHERE Connect_ID IN (SELECT Connect_ID FROM doomed);`;
  assert.deepEqual(
    checkBatchScript(sql).map((v) => v.rule),
    ["cte"]
  );
});

void test("checkBatchScript rejects temporary tables", () => {
  const sql = `CREATE TEMP TABLE doomed AS SELECT Connect_ID FROM FlatConnect.participants_JP;${GUARDED_DELETE};DROP TABLE doomed;`;
  assert.deepEqual(
    checkBatchScript(sql).map((v) => [v.statement, v.rule]),
    [
      [1, "table_ddl"],
      [3, "table_ddl"]
    ]
  );
});

void test("checkBatchScript requires both destruction flags", () => {
  const requestedOnly = `DELETE FROM Derived.steps WHERE Connect_ID IN (SELECT Connect_ID FROM FlatConnect.participants_JP WHERE d_831041022 = '353358909')`;
  assert.deepEqual(checkBatchScript(requestedOnly), [
    { statement: 1, rule: "missing_destroy_completed", message: "statement 1 does not require d_861639549 = '353358909'" }
  ]);

  const wrongValue = `DELETE FROM Derived.steps WHERE Connect_ID IN (SELECT Connect_ID FROM FlatConnect.participants_JP WHERE d_831041022 = '104430631' AND d_861639549 = '353358909')`;
  assert.deepEqual(
    checkBatchScript(wrongValue).map((v) => v.rule),
    ["missing_destroy_requested"]
  );
});

void test("checkBatchScript requires the destruction flags together", () => {
  const either = `DELETE FROM Derived.steps WHERE Connect_ID IN (SELECT Connect_ID FROM FlatConnect.participants_JP WHERE d_831041022 = '353358909' OR d_861639549 = '353358909')`;
  assert.deepEqual(checkBatchScript(either), [
    {
      statement: 1,
      rule: "flag_disjunction",
      message: "statement 1 uses OR or NOT; both destruction flags must be required together"
    }
  ]);

  const negated = `DELETE FROM Derived.steps WHERE Connect_ID IN (SELECT Connect_ID FROM FlatConnect.participants_JP WHERE d_831041022 = '353358909' AND NOT d_861639549 = '353358909')`;
  assert.deepEqual(
    checkBatchScript(negated).map((v) => v.rule),
    ["flag_disjunction"]
  );
});

void test("checkBatchScript ignores OR inside literals", () => {
  const sql = `DELETE FROM Derived.steps WHERE site = 'north or south' AND Connect_ID IN (SELECT Connect_ID FROM FlatConnect.participants_JP WHERE d_831041022 = '353358909' AND d_861639549 = '353358909')`;
  assert.deepEqual(checkBatchScript(sql), []);
});

void test("runBatchDestruction refuses a script that needs only one flag", async () => {
  let calls = 0;
  const warehouse = {
    runStatement: async () => {
      calls += 1;
    }
  };
  const sql = `DELETE FROM Derived.steps WHERE Connect_ID IN (SELECT Connect_ID FROM FlatConnect.participants_JP WHERE d_831041022 = '353358909' OR d_861639549 = '353358909')`;
  await assert.rejects(runBatchDestruction({ warehouse, logger, sql }), /Batch script rejected: statement 1 uses OR or NOT/);
  assert.equal(calls, 0);
});

void test("checkBatchScript rejects statements other than DELETE", () => {
  assert.deepEqual(
    checkBatchScript("UPDATE Derived.steps SET x = 1 WHERE true").map((v) => v.rule),
    ["not_delete"]
  );
});

void test("runBatchDestruction executes each statement in order", async () => {
  const executed: string[] = [];
  const warehouse = {
    runStatement: async (sql: string) => {
      executed.push(sql);
    }
  };
  const result = await runBatchDestruction({ warehouse, logger, sql: `${GUARDED_DELETE};\n${GUARDED_DELETE.replace("Derived.steps", "Derived.sleep")};` });
  assert.deepEqual(result, { statements: 2 });
  assert.equal(executed.length, 2);
  assert.ok(executed[0]?.startsWith("DELETE FROM Derived.steps WHERE"));
  assert.ok(executed[1]?.startsWith("DELETE FROM Derived.sleep WHERE"));
});

void test("runBatchDestruction refuses a script with violations", async () => {
  let calls = 0;
  const warehouse = {
    runStatement: async () => {
      calls += 1;
    }
  };
  await assert.rejects(
    runBatchDestruction({ warehouse, logger, sql: "DELETE FROM Derived.steps WHERE true" }),
    /Batch script rejected: statement 1 does not require d_831041022 = '353358909'; statement 1 does not require d_861639549 = '353358909'/
  );
  assert.equal(calls, 0);
});

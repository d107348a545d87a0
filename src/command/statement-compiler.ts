import type { CompiledStatement } from "../contracts/database-client.contract";
import type { SqlDialectContract } from "../drivers/sql/sql-dialect.contract";
import { MissingParameterError } from "../errors/missing-parameter.error";
import type { SqlValue, StatementParameters } from "../types";

const PARAMETER_NAME = /[A-Za-z_][A-Za-z0-9_]*/y;

/**
 * Replace `@name` placeholders with the dialect's positional placeholders.
 *
 * Placeholders inside string literals, quoted identifiers and comments are
 * left alone, and so is `@@name`.
 *
 * @example
 * ```typescript
 * compileStatement(
 *   "UPDATE rates SET rate = @rate WHERE code = @code",
 *   { code: "GBP", rate: 0.63 },
 *   new PostgresDialect(),
 * );
 * // { sql: "UPDATE rates SET rate = $1 WHERE code = $2", values: [0.63, "GBP"] }
 * ```
 *
 * @throws MissingParameterError when a placeholder has no value
 */
export function compileStatement(
  statement: string,
  parameters: StatementParameters,
  dialect: SqlDialectContract,
): CompiledStatement {
  const values: SqlValue[] = [];
  const positions = new Map<string, number>();

  const sql = replaceParameters(statement, (name) => {
    if (!Object.prototype.hasOwnProperty.call(parameters, name)) {
      throw new MissingParameterError(name);
    }

    const known = positions.get(name);

    if (dialect.numberedPlaceholders && known !== undefined) {
      return dialect.placeholder(known);
    }

    values.push(parameters[name]);
    positions.set(name, values.length);

    return dialect.placeholder(values.length);
  });

  return { sql, values };
}

/**
 * Names of the `@name` placeholders in order of first appearance
 */
export function statementParameterNames(statement: string): string[] {
  const names = new Set<string>();

  replaceParameters(statement, (name) => {
    names.add(name);
    return "";
  });

  return [...names];
}

function replaceParameters(statement: string, replace: (name: string) => string): string {
  let sql = "";
  let index = 0;

  while (index < statement.length) {
    const char = statement[index];
    const next = statement[index + 1];

    if (char === "'" || char === '"' || char === "`") {
      const end = closingQuote(statement, index, char);
      sql += statement.slice(index, end);
      index = end;
      continue;
    }

    if (char === "-" && next === "-") {
      const end = statement.indexOf("\n", index);
      const stop = end < 0 ? statement.length : end;
      sql += statement.slice(index, stop);
      index = stop;
      continue;
    }

    if (char === "/" && next === "*") {
      const end = statement.indexOf("*/", index + 2);
      const stop = end < 0 ? statement.length : end + 2;
      sql += statement.slice(index, stop);
      index = stop;
      continue;
    }

    if (char === "@") {
      if (next === "@") {
        // session variable such as @@ROWCOUNT
        const name = readName(statement, index + 2);
        sql += "@@" + name;
        index += 2 + name.length;
        continue;
      }

      const name = readName(statement, index + 1);

      if (name) {
        sql += replace(name);
        index += 1 + name.length;
        continue;
      }
    }

    sql += char;
    index++;
  }

  return sql;
}

function readName(statement: string, start: number): string {
  PARAMETER_NAME.lastIndex = start;

  return PARAMETER_NAME.exec(statement)?.[0] ?? "";
}

/**
 * Index just past the closing quote; doubled quotes are escapes
 */
function closingQuote(statement: string, start: number, quote: string): number {
  let index = start + 1;

  while (index < statement.length) {
    if (statement[index] === quote) {
      if (statement[index + 1] === quote) {
        index += 2;
        continue;
      }

      return index + 1;
    }

    index++;
  }

  return statement.length;
}

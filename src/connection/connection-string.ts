import { InvalidStateError } from "../errors/invalid-state.error";

/**
 * Connection string split into the part sent to the client and the options
 * this library consumes itself.
 */
export type ParsedConnectionString = {
  /** Connection string without the options consumed here */
  readonly connectionString: string;
  /** Whether connections auto-enlist in the ambient transaction */
  readonly enlist: boolean;
  /** Every `key=value` option, keys lower-cased */
  readonly options: ReadonlyMap<string, string>;
};

const ENLIST_KEY = "enlist";

function parseBoolean(value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case "true":
    case "yes":
    case "1":
      return true;
    case "false":
    case "no":
    case "0":
      return false;
    default:
      throw new InvalidStateError(`Invalid "Enlist" value "${value}" in connection string.`);
  }
}

function parseUrl(connectionString: string): ParsedConnectionString {
  const url = new URL(connectionString);
  const options = new Map<string, string>();
  let enlistKey: string | undefined;

  for (const [key, value] of url.searchParams) {
    options.set(key.toLowerCase(), value);

    if (key.toLowerCase() === ENLIST_KEY) {
      enlistKey = key;
    }
  }

  if (enlistKey === undefined) {
    return { connectionString, enlist: true, options };
  }

  url.searchParams.delete(enlistKey);

  return {
    connectionString: url.toString(),
    enlist: parseBoolean(options.get(ENLIST_KEY) ?? "true"),
    options,
  };
}

function parseKeyValuePairs(connectionString: string): ParsedConnectionString {
  const options = new Map<string, string>();
  const kept: string[] = [];
  let enlist = true;

  for (const segment of connectionString.split(";")) {
    const trimmed = segment.trim();

    if (!trimmed) {
      continue;
    }

    const separator = trimmed.indexOf("=");

    if (separator < 0) {
      kept.push(trimmed);
      continue;
    }

    const key = trimmed.slice(0, separator).trim().toLowerCase();
    const value = trimmed.slice(separator + 1).trim();

    options.set(key, value);

    if (key === ENLIST_KEY) {
      enlist = parseBoolean(value);
    } else {
      kept.push(trimmed);
    }
  }

  return { connectionString: kept.join(";"), enlist, options };
}

/**
 * Parse a connection string in either `Key=Value;Key=Value` or URL form.
 *
 * The `Enlist` option (`true` by default) decides whether a connection opened
 * inside an ambient transaction scope joins it; it is stripped before the
 * string reaches the client. Anything else (a bare file name, for instance)
 * is passed through untouched.
 *
 * @example
 * ```typescript
 * parseConnectionString("Data Source=app.db;Enlist=false");
 * // { connectionString: "Data Source=app.db", enlist: false, ... }
 *
 * parseConnectionString("postgres://localhost/app?enlist=false");
 * // { connectionString: "postgres://localhost/app", enlist: false, ... }
 * ```
 */
export function parseConnectionString(connectionString: string): ParsedConnectionString {
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(connectionString)) {
    return parseUrl(connectionString);
  }

  if (/^[^;=]+=/.test(connectionString.trim())) {
    return parseKeyValuePairs(connectionString);
  }

  return { connectionString, enlist: true, options: new Map() };
}

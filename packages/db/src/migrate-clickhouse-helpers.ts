import { ErrorCode, SightlineError } from "@sightline/shared/errors";

const MIGRATION_FILENAME = /^(\d{4})_([a-z0-9_]+)\.sql$/;

/** `0002_events_table.sql` → `{ version: "0002", name: "events_table" }` */
export function parseMigrationFilename(filename: string): { version: string; name: string } {
  const match = MIGRATION_FILENAME.exec(filename);
  if (!match) {
    throw new SightlineError(
      ErrorCode.DB.CH_MIGRATION_FAILED,
      `Invalid migration filename: ${filename}`,
      500,
      { filename },
    );
  }
  return { version: match[1], name: match[2] };
}

/**
 * Split a migration file into statements on `;`, dropping `--` comments.
 * Semicolons and dashes inside quoted literals or identifiers are kept.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = "";
  let quote: "'" | "`" | null = null;

  for (let i = 0; i < sql.length; i++) {
    const ch = sql[i];

    if (quote) {
      current += ch;
      if (ch === "\\" && i + 1 < sql.length) {
        current += sql[++i];
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (ch === "-" && sql[i + 1] === "-") {
      const eol = sql.indexOf("\n", i);
      i = eol === -1 ? sql.length : eol - 1;
      continue;
    }

    if (ch === ";") {
      statements.push(current);
      current = "";
      continue;
    }

    if (ch === "'" || ch === "`") quote = ch;
    current += ch;
  }
  statements.push(current);

  return statements.map((s) => s.trim()).filter((s) => s.length > 0);
}

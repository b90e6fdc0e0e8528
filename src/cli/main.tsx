/**
 * @file hty CLI entry (Ink + React)
 */
import React from "react";
import { render } from "ink";
import { App } from "./ui/App";
import { USAGE, UsageError, parseArgs, type Command } from "./args";
import { describeMetadata, formatError, printColumns } from "./describe";
import { configPatternsLabel, loadEngineOptions } from "../config";
import { defaultEngineOptions } from "../constants/format";
import { readMetadata } from "../hty/trailer";
import { filter, project, projectAndFilter } from "../hty/query";
import { appendRows } from "../hty/append";
import { convertCsvFile, readNumericRowsFile } from "../ingest/csv";
import type { ColumnValues, EngineOptions } from "../hty/types";

async function run(command: Command, options: EngineOptions): Promise<void> {
  switch (command.kind) {
    case "help":
      console.log(`${USAGE}\nConfig: ./${configPatternsLabel()} is loaded when present.\n`);
      return;
    case "interactive": {
      // filled by the app before it exits
      const picked: { columns: ColumnValues[] | null } = { columns: null };
      const { waitUntilExit } = render(
        <App
          initialPath={command.file}
          options={options}
          onResult={(columns) => {
            picked.columns = columns;
          }}
        />,
      );
      await waitUntilExit();
      if (picked.columns) {
        printColumns(picked.columns);
      }
      return;
    }
    case "convert": {
      const m = convertCsvFile(command.csv, command.hty, options);
      const columns = m.groups.reduce((n, g) => n + g.numColumns, 0);
      console.log(`wrote ${command.hty}: ${m.numRows} row(s), ${columns} column(s)`);
      return;
    }
    case "info":
      describeMetadata(readMetadata(command.file, options)).forEach((line) => console.log(line));
      return;
    case "project":
      printColumns(project(command.file, command.columns, options));
      return;
    case "filter": {
      const values = filter(command.file, command.where, options);
      printColumns([{ name: command.where.column, values }]);
      return;
    }
    case "select":
      printColumns(projectAndFilter(command.file, command.columns, command.where, options));
      return;
    case "append": {
      const rows = readNumericRowsFile(command.rowsFile);
      const m = appendRows(command.source, command.destination, rows, options);
      console.log(`wrote ${command.destination}: ${rows.length} row(s) appended, ${m.numRows} total`);
      return;
    }
  }
}

async function main() {
  const args = (() => {
    try {
      return parseArgs(process.argv.slice(2));
    } catch (e) {
      if (e instanceof UsageError) {
        console.error(formatError(e));
        console.error(USAGE);
        process.exit(2);
      }
      throw e;
    }
  })();
  if (args.command.kind === "help") {
    await run(args.command, defaultEngineOptions());
    return;
  }
  const { options } = await loadEngineOptions(args.configPath);
  await run(args.command, options);
}

main().catch((e) => {
  console.error(formatError(e));
  process.exit(1);
});

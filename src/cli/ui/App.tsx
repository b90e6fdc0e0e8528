/**
 * @file Interactive viewer: choose a file, pick a column, print it
 */
import React, { useEffect, useState } from "react";
import { Box, Text, useApp } from "ink";
import SelectInput from "ink-select-input";
import TextInput from "ink-text-input";
import type { ColumnValues, EngineOptions, Metadata } from "../../hty/types";
import { readMetadata } from "../../hty/trailer";
import { project } from "../../hty/query";
import { formatError } from "../describe";
import { isError } from "../../util/is-error";
import { Hint, Title } from "./components/ui";

export type Phase =
  | { step: "path"; draft: string; error?: string }
  | { step: "column"; path: string; metadata: Metadata };

type ColumnItem = { key: string; label: string; value: string };

/** Open `path` and move to column selection, or stay on the prompt with the error shown. */
export function openPhase(path: string, options: EngineOptions): Phase {
  try {
    return { step: "column", path, metadata: readMetadata(path, options) };
  } catch (e) {
    return { step: "path", draft: path, error: formatError(e) };
  }
}

/** Select items for every column, labelled with the group it lives in. */
export function columnItems(metadata: Metadata): ColumnItem[] {
  return metadata.groups.flatMap((g, gi) =>
    g.columns.map((c, ci) => ({ key: `${gi}:${ci}`, label: `${c.name}  (group ${gi})`, value: c.name })),
  );
}

type AppProps = {
  initialPath?: string;
  options: EngineOptions;
  /** Receives the projected column; printing happens after the app exits. */
  onResult: (columns: ColumnValues[]) => void;
};

/** App: prompt → column list → projected column handed to `onResult`. */
export function App({ initialPath, options, onResult }: AppProps) {
  const { exit } = useApp();
  const [phase, setPhase] = useState<Phase>(() =>
    initialPath ? openPhase(initialPath, options) : { step: "path", draft: "" },
  );

  useEffect(() => {
    if (phase.step === "column" && phase.metadata.groups.every((g) => g.numColumns === 0)) {
      exit();
    }
  }, [phase, exit]);

  if (phase.step === "column") {
    const items = columnItems(phase.metadata);
    if (items.length === 0) {
      return <Text color="yellow">{`${phase.path} has no columns`}</Text>;
    }
    return (
      <Box flexDirection="column">
        <Title label="Pick a column" subtitle={`${phase.path}: ${phase.metadata.numRows} row(s)`} />
        <SelectInput
          items={items}
          onSelect={(item) => {
            try {
              onResult(project(phase.path, [item.value], options));
              exit();
            } catch (e) {
              exit(isError(e) ? e : new Error(String(e)));
            }
          }}
        />
        <Hint>↑/↓ to move, Enter to print the column</Hint>
      </Box>
    );
  }

  return (
    <Box flexDirection="column">
      <Title label="hty" subtitle="Open a file to browse its columns" />
      <Box>
        <Box width={12}>
          <Text>HTY file:</Text>
        </Box>
        <TextInput
          value={phase.draft}
          onChange={(draft) => setPhase({ step: "path", draft })}
          onSubmit={(value) => setPhase(openPhase(value.trim(), options))}
        />
      </Box>
      {phase.error ? <Text color="red">{phase.error}</Text> : null}
    </Box>
  );
}

/**
 * @file UI primitives shared by the interactive viewer
 */
import React from "react";
import { Box, Text } from "ink";

/** Cyan title with optional gray subtitle lines. */
export function Title({ label, subtitle }: { label: string; subtitle?: string | string[] }) {
  const subs = Array.isArray(subtitle) ? subtitle : subtitle ? [subtitle] : [];
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text color="cyan">{label}</Text>
      {subs.map((s, i) => (
        <Text key={i} color="gray">
          {s}
        </Text>
      ))}
    </Box>
  );
}

/** Gray hint line. */
export function Hint({ children }: { children: string }) {
  return <Text color="gray">{children}</Text>;
}

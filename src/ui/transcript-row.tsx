import React from "react";
import { Box, Text } from "ink";
import type { TranscriptEntry } from "../core/runtime.js";
import { MemoizedMarkdownText } from "./markdown.js";

export const GLYPH_USER = "> ";
export const GLYPH_ASSISTANT = "⟣ ";
export const GLYPH_SYSTEM = "⌁ ";

export function TranscriptRow({ entry }: { entry: TranscriptEntry }) {
  switch (entry.kind) {
    case "user":
      return (
        <Box marginBottom={1}>
          <Text color="blueBright">
            {GLYPH_USER}
            {entry.text}
          </Text>
        </Box>
      );
    case "assistant":
      return (
        <Box flexDirection="column" marginBottom={1}>
          <MemoizedMarkdownText text={entry.text} prefix={GLYPH_ASSISTANT} />
        </Box>
      );
    case "tool":
      // call and result rows sit together, so no gap after the call
      return (
        <Box marginBottom={entry.label === "Tool" ? 0 : 1}>
          <Text color={entry.label === "Tool" ? "cyan" : "gray"}>
            {entry.label === "Tool" ? GLYPH_SYSTEM : "  "}
            {entry.label.toLowerCase()}: {entry.text}
          </Text>
        </Box>
      );
    case "error":
      return (
        <Box marginBottom={1}>
          <Text color="red">
            {GLYPH_SYSTEM}
            {entry.text}
          </Text>
        </Box>
      );
    case "system":
      if (entry.label === "System") {
        return (
          <Box flexDirection="column" marginBottom={1}>
            <MemoizedMarkdownText text={entry.text} prefix={GLYPH_SYSTEM} />
          </Box>
        );
      }
      return (
        <Box flexDirection="column" marginBottom={1}>
          <Text color="cyanBright">
            {GLYPH_SYSTEM}
            {entry.label}
          </Text>
          <MemoizedMarkdownText text={entry.text} prefix="  " />
        </Box>
      );
  }
}

export const MemoizedTranscriptRow = React.memo(TranscriptRow);

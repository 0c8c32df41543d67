import { Box, Text } from "ink";
import { clipPreview, formatTokenCount, type RuntimeSnapshot } from "../core/runtime.js";

const TITLE_PREVIEW_LENGTH = 40;

export function formatStatusLine(snapshot: RuntimeSnapshot): string {
  const parts = [
    `Tokens: ${formatTokenCount(snapshot.totalTokens)}`,
    `Msgs: ${snapshot.messageCount}`,
    `Tools: ${snapshot.toolNames.length}${snapshot.toolsConnected ? "" : " (offline)"}`,
  ];
  const title = snapshot.sessionTitle ? `  ${clipPreview(snapshot.sessionTitle, TITLE_PREVIEW_LENGTH)}` : "";
  return `${parts.join(" · ")}${title}`;
}

export function StatusBar({ snapshot }: { snapshot: RuntimeSnapshot }) {
  return (
    <Box>
      <Text color={snapshot.toolsConnected ? "gray" : "yellow"}>{formatStatusLine(snapshot)}</Text>
    </Box>
  );
}

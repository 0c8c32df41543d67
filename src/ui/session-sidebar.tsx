import { Box, Text } from "ink";
import type { ChatSessionSummary } from "../chat-history.js";
import { clipPreview } from "../core/runtime.js";
import { getOptionWindow } from "./option-window.js";

const SIDEBAR_TITLE_LENGTH = 36;

export function formatSessionLabel(session: ChatSessionSummary): string {
  const stamp = session.updated_at ? session.updated_at.slice(0, 16).replace("T", " ") : "unknown";
  return `${clipPreview(session.title, SIDEBAR_TITLE_LENGTH)} (${stamp})`;
}

export function SessionSidebar({
  sessions,
  selectedIndex,
  currentSessionId,
}: {
  sessions: ChatSessionSummary[];
  selectedIndex: number;
  currentSessionId: string;
}) {
  const windowed = getOptionWindow(sessions, selectedIndex);

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="gray" paddingX={1} marginTop={1}>
      <Text color="cyanBright">sessions</Text>
      {sessions.length === 0 && <Text color="gray">no saved sessions yet</Text>}
      {windowed.options.map((session, windowIndex) => {
        const absoluteIndex = windowed.startIndex + windowIndex;
        const selected = absoluteIndex === windowed.activeIndex;
        const current = session.id === currentSessionId ? " *" : "";
        return (
          <Text key={session.id} color={selected ? "magentaBright" : "gray"}>
            {selected ? ">" : " "} {formatSessionLabel(session)}
            {current}
          </Text>
        );
      })}
      {sessions.length > windowed.options.length && (
        <Text color="gray">
          showing {windowed.startIndex + 1}-{windowed.startIndex + windowed.options.length} of {sessions.length}
        </Text>
      )}
      <Text color="gray">up/down select | enter open | esc close</Text>
    </Box>
  );
}

import React from "react";
import { Box, Text } from "ink";

/** Line-oriented markdown: fenced code, headings, bullets, quotes and inline emphasis. */
export function MarkdownText({ text, prefix = "" }: { text: string; prefix?: string }) {
  const lines = text.replace(/\r\n/g, "\n").split("\n");
  let usedPrefix = false;
  let inCodeBlock = false;

  return (
    <Box flexDirection="column">
      {lines.map((line, index) => {
        const trimmed = line.trim();
        const linePrefix = trimmed.length > 0 ? (!usedPrefix ? prefix : " ".repeat(prefix.length)) : "";
        if (trimmed.length > 0) {
          usedPrefix = true;
        }

        if (/^```/.test(trimmed)) {
          inCodeBlock = !inCodeBlock;
          return null;
        }

        if (inCodeBlock) {
          return (
            <Text key={`line-${index}`} color="yellow">
              {linePrefix}
              {line}
            </Text>
          );
        }

        if (!trimmed) {
          return <Text key={`line-${index}`}> </Text>;
        }

        const headingMatch = line.match(/^(#{1,6})\s+(.+)$/);
        if (headingMatch) {
          return (
            <Text key={`line-${index}`} color="cyanBright" bold>
              {linePrefix}
              {renderInlineMarkdown(headingMatch[2] ?? "", `h-${index}`)}
            </Text>
          );
        }

        const bulletMatch = line.match(/^(\s*)[-*]\s+(.+)$/);
        if (bulletMatch) {
          return (
            <Text key={`line-${index}`} color="white">
              {linePrefix}
              {" ".repeat(bulletMatch[1]?.length ?? 0)}* {renderInlineMarkdown(bulletMatch[2] ?? "", `b-${index}`)}
            </Text>
          );
        }

        const quoteMatch = line.match(/^\s*>\s+(.+)$/);
        if (quoteMatch) {
          return (
            <Text key={`line-${index}`} color="gray">
              {linePrefix}| {renderInlineMarkdown(quoteMatch[1] ?? "", `q-${index}`)}
            </Text>
          );
        }

        return (
          <Text key={`line-${index}`} color="white">
            {linePrefix}
            {renderInlineMarkdown(line, `p-${index}`)}
          </Text>
        );
      })}
    </Box>
  );
}

export const MemoizedMarkdownText = React.memo(MarkdownText);

export function renderInlineMarkdown(input: string, keyPrefix: string): React.ReactNode[] {
  const text = input.replace(/\[([^\]]+)\]\(([^)]+)\)/g, "$1 ($2)");
  const tokens = text.split(/(\*\*[^*]+\*\*|`[^`]+`|\*[^*]+\*)/g);

  const nodes: React.ReactNode[] = [];
  let index = 0;
  for (const token of tokens) {
    if (!token) {
      continue;
    }
    if (token.startsWith("**") && token.endsWith("**") && token.length > 4) {
      nodes.push(
        <Text key={`${keyPrefix}-${index++}`} bold>
          {token.slice(2, -2)}
        </Text>,
      );
      continue;
    }
    if (token.startsWith("`") && token.endsWith("`") && token.length > 2) {
      nodes.push(
        <Text key={`${keyPrefix}-${index++}`} color="yellow">
          {token.slice(1, -1)}
        </Text>,
      );
      continue;
    }
    if (token.startsWith("*") && token.endsWith("*") && token.length > 2) {
      nodes.push(
        <Text key={`${keyPrefix}-${index++}`} italic>
          {token.slice(1, -1)}
        </Text>,
      );
      continue;
    }
    nodes.push(<Text key={`${keyPrefix}-${index++}`}>{token}</Text>);
  }
  return nodes;
}

import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { ChatMessage } from "./chat-types.js";
import { SessionNotFoundError } from "./errors.js";
import { getSessionsDirectory, writeJsonFileAtomic } from "./persistence.js";

const SESSION_FILE_SUFFIX = ".json";
const SESSION_ID_LENGTH = 12;
const MAX_SESSION_TITLE_LENGTH = 60;
const DEFAULT_LIST_LIMIT = 20;
const UNTITLED = "(untitled)";
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export type ChatSessionSummary = {
  id: string;
  title: string;
  created_at: string;
  updated_at: string;
  model: string;
};

export type ChatSessionRecord = ChatSessionSummary & {
  messages: ChatMessage[];
};

const toolCallSchema = z.object({
  id: z.string(),
  type: z.literal("function"),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

const messageSchema = z.discriminatedUnion("role", [
  z.object({ role: z.literal("system"), content: z.string() }),
  z.object({ role: z.literal("user"), content: z.string() }),
  z.object({
    role: z.literal("assistant"),
    content: z.string().nullable(),
    tool_calls: z.array(toolCallSchema).optional(),
  }),
  z.object({ role: z.literal("tool"), content: z.string(), tool_call_id: z.string() }),
]);

// Listing reads only these keys, so a bad message never hides a session.
const sessionMetadataSchema = z.object({
  id: z.string().min(1),
  title: z.string().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
  model: z.string().optional(),
});

const sessionSchema = sessionMetadataSchema.extend({
  messages: z.array(messageSchema).optional(),
});

export function generateSessionId(): string {
  return randomUUID().replace(/-/g, "").slice(0, SESSION_ID_LENGTH);
}

/**
 * One JSON document per session, named `<id>.json`. Documents are always
 * rewritten whole; nothing is patched in place.
 */
export class ChatSessionStore {
  readonly directory: string;

  constructor(directory: string = getSessionsDirectory()) {
    this.directory = directory;
  }

  /** Ids are a single path segment of letters, digits, `_` and `-`. */
  pathFor(sessionId: string): string {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      throw new SessionNotFoundError(sessionId, "invalid session id");
    }
    return path.join(this.directory, `${sessionId}${SESSION_FILE_SUFFIX}`);
  }

  /**
   * System messages are dropped; the live prompt is re-injected on load.
   * Returns null when nothing remains to persist.
   */
  save(sessionId: string, title: string, model: string, messages: ChatMessage[]): string | null {
    const savedMessages = messages.filter((message) => message.role !== "system");
    if (savedMessages.length === 0) {
      return null;
    }

    const filePath = this.pathFor(sessionId);
    const now = new Date().toISOString();
    const createdAt = this.readCreatedAt(filePath) ?? now;

    const record: ChatSessionRecord = {
      id: sessionId,
      title: truncateTitle(title),
      created_at: createdAt,
      updated_at: now,
      model,
      messages: savedMessages.map((message) => structuredClone(message)),
    };
    writeJsonFileAtomic(filePath, record);
    return filePath;
  }

  load(sessionId: string): ChatSessionRecord {
    const filePath = this.pathFor(sessionId);
    if (!fs.existsSync(filePath)) {
      throw new SessionNotFoundError(sessionId);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SessionNotFoundError(sessionId, `unreadable session file: ${message}`);
    }

    const parsed = sessionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SessionNotFoundError(sessionId, "invalid session document");
    }

    return {
      ...toSummary(parsed.data),
      messages: (parsed.data.messages ?? []).filter((message) => message.role !== "system"),
    };
  }

  /** Metadata only. Corrupt or unreadable files are skipped one by one. */
  list(limit = DEFAULT_LIST_LIMIT): ChatSessionSummary[] {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(this.directory, { withFileTypes: true });
    } catch {
      return [];
    }

    const sessions: ChatSessionSummary[] = [];
    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith(SESSION_FILE_SUFFIX)) {
        continue;
      }
      try {
        const raw: unknown = JSON.parse(fs.readFileSync(path.join(this.directory, entry.name), "utf8"));
        const parsed = sessionMetadataSchema.safeParse(raw);
        if (parsed.success) {
          sessions.push(toSummary(parsed.data));
        }
      } catch {
        continue;
      }
    }

    sessions.sort((left, right) => right.updated_at.localeCompare(left.updated_at));
    return sessions.slice(0, Math.max(0, Math.floor(limit)));
  }

  private readCreatedAt(filePath: string): string | null {
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      const parsed = sessionMetadataSchema.safeParse(raw);
      return parsed.success && parsed.data.created_at ? parsed.data.created_at : null;
    } catch {
      return null;
    }
  }
}

export function truncateTitle(title: string): string {
  return title.slice(0, MAX_SESSION_TITLE_LENGTH);
}

function toSummary(data: z.infer<typeof sessionMetadataSchema>): ChatSessionSummary {
  return {
    id: data.id,
    title: data.title || UNTITLED,
    created_at: data.created_at ?? "",
    updated_at: data.updated_at ?? "",
    model: data.model ?? "",
  };
}

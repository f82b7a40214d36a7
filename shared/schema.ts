import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, jsonb, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Intent types the assistant can classify a query into
export const INTENT_TYPES = [
  "search_papers",
  "author_info",
  "citation_analysis",
  "trend_analysis",
  "keyword_analysis",
  "unknown",
] as const;
export type IntentType = typeof INTENT_TYPES[number];

export const MESSAGE_ROLES = ["user", "assistant"] as const;
export type MessageRole = typeof MESSAGE_ROLES[number];

export const conversations = pgTable(
  "conversations",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    userId: varchar("user_id").notNull(),
    title: text("title").notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => [index("IDX_conversations_user").on(table.userId)],
);

export const messages = pgTable(
  "messages",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    conversationId: varchar("conversation_id").notNull(),
    role: text("role").notNull(), // "user" or "assistant"
    content: text("content").notNull(),
    intentType: text("intent_type"), // Set on turns produced by the assistant
    parameters: jsonb("parameters").$type<Record<string, unknown>>(), // Resolved intent slots, reused for follow-ups
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [index("IDX_messages_conversation").on(table.conversationId, table.createdAt)],
);

export const insertConversationSchema = createInsertSchema(conversations).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

export const insertMessageSchema = createInsertSchema(messages).omit({
  id: true,
  createdAt: true,
}).extend({
  role: z.enum(MESSAGE_ROLES),
  intentType: z.enum(INTENT_TYPES).nullable().optional(),
  parameters: z.record(z.unknown()).nullable().optional(),
});

/**
 * Body of POST /api/chat.
 * Recent turns may be supplied by callers that keep their own history.
 */
export const chatRequestSchema = z.object({
  message: z.string().trim().min(1, "Message is required").max(2000, "Message is too long"),
  userId: z.string().trim().min(1, "userId is required"),
  conversationId: z.string().min(1).nullable().optional(),
});

export type InsertConversation = z.infer<typeof insertConversationSchema>;
export type Conversation = typeof conversations.$inferSelect;

export type InsertMessage = z.infer<typeof insertMessageSchema>;
export type Message = typeof messages.$inferSelect;

export type ChatRequest = z.infer<typeof chatRequestSchema>;

/**
 * A research question as received by the assistant. Frozen on creation.
 */
export type Query = Readonly<{
  text: string;
  userId: string;
  conversationId: string | null;
  timestamp: Date;
}>;

/**
 * One entry of a conversation as the assistant core sees it. Assistant turns
 * carry the intent type and resolved slots so follow-ups can refer back.
 */
export type ConversationTurn = {
  role: MessageRole;
  content: string;
  intentType?: IntentType | null;
  parameters?: Record<string, unknown> | null;
  createdAt: Date;
};

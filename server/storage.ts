import {
  type Conversation,
  type ConversationTurn,
  type InsertMessage,
  type IntentType,
  type Message,
  type MessageRole,
  INTENT_TYPES,
  MESSAGE_ROLES,
  conversations as conversationsTable,
  insertConversationSchema,
  insertMessageSchema,
  messages as messagesTable,
} from "@shared/schema";
import { randomUUID } from "crypto";
import { drizzle } from "drizzle-orm/neon-http";
import { neon } from "@neondatabase/serverless";
import { asc, desc, eq } from "drizzle-orm";

export interface IStorage {
  // Conversations
  createConversation(userId: string, title: string): Promise<Conversation>;
  getConversation(id: string): Promise<Conversation | undefined>;

  // Turns
  getRecentTurns(conversationId: string, limit: number): Promise<ConversationTurn[]>;
  appendTurns(conversationId: string, turns: ConversationTurn[]): Promise<void>;
  getMessages(conversationId: string): Promise<Message[]>;
}

function toIntentType(value: string | null): IntentType | null {
  return INTENT_TYPES.find(t => t === value) ?? null;
}

function toRole(value: string): MessageRole {
  return MESSAGE_ROLES.find(r => r === value) ?? "user";
}

export function messageToTurn(message: Message): ConversationTurn {
  return {
    role: toRole(message.role),
    content: message.content,
    intentType: toIntentType(message.intentType),
    parameters: message.parameters ?? null,
    createdAt: message.createdAt,
  };
}

function toInsertMessage(conversationId: string, turn: ConversationTurn): InsertMessage {
  return insertMessageSchema.parse({
    conversationId,
    role: turn.role,
    content: turn.content,
    intentType: turn.intentType ?? null,
    parameters: turn.parameters ?? null,
  });
}

export class MemStorage implements IStorage {
  private conversations: Map<string, Conversation>;
  private messages: Map<string, Message[]>;

  constructor() {
    this.conversations = new Map();
    this.messages = new Map();
  }

  async createConversation(userId: string, title: string): Promise<Conversation> {
    const now = new Date();
    const values = insertConversationSchema.parse({ userId, title });
    const conversation: Conversation = { id: randomUUID(), ...values, createdAt: now, updatedAt: now };
    this.conversations.set(conversation.id, conversation);
    this.messages.set(conversation.id, []);
    return conversation;
  }

  async getConversation(id: string): Promise<Conversation | undefined> {
    return this.conversations.get(id);
  }

  async getRecentTurns(conversationId: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) return [];
    const stored = this.messages.get(conversationId) ?? [];
    return stored.slice(-limit).map(messageToTurn);
  }

  async appendTurns(conversationId: string, turns: ConversationTurn[]): Promise<void> {
    const stored = this.messages.get(conversationId) ?? [];
    for (const turn of turns) {
      const row = toInsertMessage(conversationId, turn);
      stored.push({
        id: randomUUID(),
        ...row,
        intentType: row.intentType ?? null,
        parameters: row.parameters ?? null,
        createdAt: turn.createdAt,
      });
    }
    this.messages.set(conversationId, stored);

    const conversation = this.conversations.get(conversationId);
    if (conversation) {
      this.conversations.set(conversationId, { ...conversation, updatedAt: new Date() });
    }
  }

  async getMessages(conversationId: string): Promise<Message[]> {
    return [...(this.messages.get(conversationId) ?? [])];
  }
}

export class DbStorage implements IStorage {
  private db;

  constructor(databaseUrl: string) {
    const queryClient = neon(databaseUrl);
    this.db = drizzle(queryClient);
  }

  async createConversation(userId: string, title: string): Promise<Conversation> {
    const results = await this.db
      .insert(conversationsTable)
      .values(insertConversationSchema.parse({ userId, title }))
      .returning();
    return results[0];
  }

  async getConversation(id: string): Promise<Conversation | undefined> {
    const results = await this.db
      .select()
      .from(conversationsTable)
      .where(eq(conversationsTable.id, id))
      .limit(1);
    return results[0];
  }

  async getRecentTurns(conversationId: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) return [];
    // Newest first; a user turn and its answer may share a timestamp, "assistant" sorts before "user"
    const results = await this.db
      .select()
      .from(messagesTable)
      .where(eq(messagesTable.conversationId, conversationId))
      .orderBy(desc(messagesTable.createdAt), asc(messagesTable.role))
      .limit(limit);
    return results.reverse().map(messageToTurn);
  }

  async appendTurns(conversationId: string, turns: ConversationTurn[]): Promise<void> {
    if (turns.length === 0) return;
    await this.db.insert(messagesTable).values(
      turns.map(turn => ({ ...toInsertMessage(conversationId, turn), createdAt: turn.createdAt })),
    );
    await this.db
      .update(conversationsTable)
      .set({ updatedAt: new Date() })
      .where(eq(conversationsTable.id, conversationId));
  }

  async getMessages(conversationId: string): Promise<Message[]> {
    return this.db
      .select()
      .from(messagesTable)
      .where(eq(messagesTable.conversationId, conversationId))
      .orderBy(asc(messagesTable.createdAt), desc(messagesTable.role));
  }
}

export function createStorage(databaseUrl?: string): IStorage {
  if (databaseUrl) {
    return new DbStorage(databaseUrl);
  }
  console.log("[Storage] DATABASE_URL not set, keeping conversations in memory");
  return new MemStorage();
}

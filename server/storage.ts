import { and, asc, desc, eq, gte, inArray, isNull, lt, or, sql } from "drizzle-orm";
import type { AnyPgColumn } from "drizzle-orm/pg-core";
import { v4 as uuidv4 } from "uuid";
import * as schema from "@shared/schema";
import type {
  Device,
  DeviceRegistration,
  EggbookComment,
  EggbookCommentGeneration,
  EggbookIdea,
  EggbookNotification,
  EggbookTodo,
  EventFields,
  EventRecord,
  EventStatus,
  InsertEvent,
  InsertMemory,
  Memory,
  User,
} from "@shared/schema";
import { getNow, wrapDbOperation, type Database, type Transaction } from "./db";
import { PersistenceError } from "./pipeline/errors";
import type {
  CommitResult,
  CommentGenerationFields,
  CommentStore,
  DaySignals,
  EggbookStore,
  EventStore,
  ExtractedEntry,
  NewComment,
} from "./pipeline/types";

export interface NewIdea {
  title: string | null;
  content: string;
}

export interface TodoChanges {
  title?: string;
  isAccepted?: boolean;
  isPinned?: boolean;
}

export interface NewNotification {
  title: string;
  notifyAt: string;
  todoId: string | null;
}

export interface IdeaCounts {
  total: number;
  placeholders: number;
}

/**
 * Everything the HTTP layer and the pipeline need from persistence.
 * Reads are scoped by user id wherever a client supplies the record id.
 */
export interface AppStorage extends EventStore, EggbookStore, CommentStore {
  createUser(): Promise<User>;
  getUser(id: string): Promise<User | undefined>;

  getDevice(id: string): Promise<Device | undefined>;
  saveDevice(userId: string, registration: DeviceRegistration): Promise<Device>;

  createMemory(userId: string, data: InsertMemory): Promise<Memory>;

  getEventForUser(userId: string, id: string): Promise<EventRecord | undefined>;

  listIdeas(userId: string): Promise<EggbookIdea[]>;
  getIdea(userId: string, id: string): Promise<EggbookIdea | undefined>;
  createIdea(userId: string, idea: NewIdea): Promise<EggbookIdea>;
  deleteIdea(userId: string, id: string): Promise<boolean>;
  getIdeaForEvent(userId: string, eventId: string): Promise<EggbookIdea | undefined>;
  /** Creates or refreshes the empty idea that stands in for a screen recording until it is analysed. */
  upsertPlaceholderIdea(event: EventRecord): Promise<EggbookIdea>;
  countIdeas(userId: string): Promise<IdeaCounts>;

  listTodos(userId: string): Promise<EggbookTodo[]>;
  getTodo(userId: string, id: string): Promise<EggbookTodo | undefined>;
  createTodo(userId: string, title: string): Promise<EggbookTodo>;
  updateTodo(userId: string, id: string, changes: TodoChanges): Promise<EggbookTodo | undefined>;
  deleteTodo(userId: string, id: string): Promise<boolean>;

  listNotifications(userId: string): Promise<EggbookNotification[]>;
  createNotification(userId: string, notification: NewNotification): Promise<EggbookNotification>;
  rescheduleNotification(userId: string, id: string, notifyAt: string): Promise<EggbookNotification | undefined>;
  deleteNotification(userId: string, id: string): Promise<boolean>;

  /** Comments with startDate <= date < endDate, newest first. */
  listComments(userId: string, startDate: string, endDate: string): Promise<EggbookComment[]>;
  createComment(userId: string, comment: NewComment): Promise<EggbookComment>;
  getGenerationState(userId: string, date: string): Promise<EggbookCommentGeneration | undefined>;
}

export function isPlaceholderIdea(idea: Pick<EggbookIdea, "title" | "content">): boolean {
  return !(idea.title ?? "").trim() && !(idea.content ?? "").trim();
}

function present(column: AnyPgColumn) {
  return sql`coalesce(trim(${column}), '') <> ''`;
}

function blank(column: AnyPgColumn) {
  return sql`coalesce(trim(${column}), '') = ''`;
}

const { events, eggbookIdeas, eggbookTodos, eggbookNotifications, eggbookComments, eggbookCommentGenerations } = schema;

const retryableStatuses: EventStatus[] = ["pending", "failed"];

export class PgStorage implements AppStorage {
  constructor(private readonly db: Database) {}

  // ============================================
  // USERS, DEVICES, MEMORIES
  // ============================================

  async createUser(): Promise<User> {
    return wrapDbOperation("createUser", async () => {
      const [result] = await this.db.insert(schema.users).values({
        id: uuidv4(),
        createdAt: getNow(),
      }).returning();
      return result;
    });
  }

  async getUser(id: string): Promise<User | undefined> {
    return wrapDbOperation("getUser", async () => {
      const [result] = await this.db.select().from(schema.users).where(eq(schema.users.id, id));
      return result;
    });
  }

  async getDevice(id: string): Promise<Device | undefined> {
    return wrapDbOperation("getDevice", async () => {
      const [result] = await this.db.select().from(schema.devices).where(eq(schema.devices.id, id));
      return result;
    });
  }

  async saveDevice(userId: string, registration: DeviceRegistration): Promise<Device> {
    return wrapDbOperation("saveDevice", async () => {
      const fields = {
        deviceModel: registration.device_model,
        os: registration.os,
        language: registration.language,
        timezone: registration.timezone,
      };
      const [result] = await this.db.insert(schema.devices)
        .values({ id: registration.device_id, userId, createdAt: getNow(), ...fields })
        .onConflictDoUpdate({ target: schema.devices.id, set: fields })
        .returning();
      return result;
    });
  }

  async createMemory(userId: string, data: InsertMemory): Promise<Memory> {
    return wrapDbOperation("createMemory", async () => {
      const [result] = await this.db.insert(schema.memories).values({
        ...data,
        id: uuidv4(),
        userId,
        createdAt: getNow(),
      }).returning();
      return result;
    });
  }

  // ============================================
  // EVENT STORE
  // ============================================

  async create(event: InsertEvent): Promise<EventRecord> {
    return wrapDbOperation("createEvent", async () => {
      const [result] = await this.db.insert(events).values(event).returning();
      return result;
    });
  }

  async update(id: string, fields: EventFields): Promise<EventRecord | undefined> {
    return wrapDbOperation("updateEvent", async () => {
      const [result] = await this.db.update(events)
        .set({ ...fields, updatedAt: getNow() })
        .where(eq(events.id, id))
        .returning();
      return result;
    });
  }

  async get(id: string): Promise<EventRecord | undefined> {
    return wrapDbOperation("getEvent", async () => {
      const [result] = await this.db.select().from(events).where(eq(events.id, id));
      return result;
    });
  }

  async getEventForUser(userId: string, id: string): Promise<EventRecord | undefined> {
    return wrapDbOperation("getEventForUser", async () => {
      const [result] = await this.db.select().from(events)
        .where(and(eq(events.id, id), eq(events.userId, userId)));
      return result;
    });
  }

  async settleStatus(id: string, status: EventStatus): Promise<boolean> {
    return wrapDbOperation("settleEventStatus", async () => {
      const updated = await this.db.update(events)
        .set({ status, updatedAt: getNow() })
        .where(and(eq(events.id, id), eq(events.status, "transcribing")))
        .returning({ id: events.id });
      return updated.length > 0;
    });
  }

  async markRunStarted(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    await wrapDbOperation("markRunStarted", async () => {
      await this.db.update(events)
        .set({
          status: "transcribing",
          aiAttempts: sql`${events.aiAttempts} + 1`,
          updatedAt: getNow(),
        })
        .where(inArray(events.id, ids));
    });
  }

  async listPendingBatchable(userId: string, maxAttempts: number): Promise<EventRecord[]> {
    return wrapDbOperation("listPendingBatchable", async () => {
      return await this.db.select().from(events)
        .where(and(
          eq(events.userId, userId),
          inArray(events.status, retryableStatuses),
          lt(events.aiAttempts, maxAttempts),
          blank(events.screenRecordingUrl),
          blank(events.recordingUrl),
          or(present(events.transcript), present(events.audioUrl)),
        ))
        .orderBy(asc(events.eventAt));
    });
  }

  async listPendingSingles(userId: string, maxAttempts: number): Promise<EventRecord[]> {
    return wrapDbOperation("listPendingSingles", async () => {
      return await this.db.select().from(events)
        .where(and(
          eq(events.userId, userId),
          inArray(events.status, retryableStatuses),
          lt(events.aiAttempts, maxAttempts),
          or(present(events.screenRecordingUrl), present(events.recordingUrl)),
        ))
        .orderBy(asc(events.eventAt));
    });
  }

  async listUsersWithPendingWork(maxAttempts: number): Promise<string[]> {
    return wrapDbOperation("listUsersWithPendingWork", async () => {
      const rows = await this.db.selectDistinct({ userId: events.userId }).from(events)
        .where(and(
          inArray(events.status, retryableStatuses),
          lt(events.aiAttempts, maxAttempts),
          or(
            present(events.transcript),
            present(events.audioUrl),
            present(events.screenRecordingUrl),
            present(events.recordingUrl),
          ),
        ));
      return rows.map((row) => row.userId);
    });
  }

  async listStaleTranscribing(updatedBefore: string): Promise<EventRecord[]> {
    return wrapDbOperation("listStaleTranscribing", async () => {
      return await this.db.select().from(events)
        .where(and(eq(events.status, "transcribing"), lt(events.updatedAt, updatedBefore)));
    });
  }

  async listForDay(userId: string, startIso: string, endIso: string): Promise<EventRecord[]> {
    return wrapDbOperation("listEventsForDay", async () => {
      return await this.db.select().from(events)
        .where(and(eq(events.userId, userId), gte(events.eventAt, startIso), lt(events.eventAt, endIso)))
        .orderBy(asc(events.eventAt));
    });
  }

  // ============================================
  // EGGBOOK STORE
  // ============================================

  async insert(userId: string, entry: ExtractedEntry): Promise<string> {
    const [id] = await this.insertMany(userId, [entry]);
    if (id === undefined) {
      throw new PersistenceError("Eggbook insert returned no id", "insertEggbookEntry");
    }
    return id;
  }

  /** All entries land in one transaction. */
  async insertMany(userId: string, entries: ExtractedEntry[]): Promise<string[]> {
    if (entries.length === 0) return [];

    return wrapDbOperation("insertEggbookEntries", async () => {
      return await this.db.transaction((tx) => this.writeEntries(tx, userId, entries));
    });
  }

  async commitEntries(userId: string, entries: ExtractedEntry[], eventIds: string[]): Promise<CommitResult> {
    return wrapDbOperation("commitEggbookEntries", async () => {
      return await this.db.transaction(async (tx) => {
        const entryIds = await this.writeEntries(tx, userId, entries);
        if (eventIds.length === 0) {
          return { entryIds, processed: [] };
        }
        const moved = await tx.update(events)
          .set({ status: "processed", updatedAt: getNow() })
          .where(and(inArray(events.id, eventIds), eq(events.status, "transcribing")))
          .returning({ id: events.id });
        return { entryIds, processed: moved.map((row) => row.id) };
      });
    });
  }

  /**
   * An idea whose first source event owns a placeholder idea fills that
   * placeholder instead of adding a row.
   */
  private async writeEntries(tx: Transaction, userId: string, entries: ExtractedEntry[]): Promise<string[]> {
    const ids: string[] = [];
    const now = getNow();

    for (const entry of entries) {
      const sourceEventIds = entry.sourceEventIds;
      const sourceEventId = sourceEventIds[0] ?? null;
      const common = { userId, sourceEventId, sourceEventIds, createdAt: now };

      switch (entry.kind) {
        case "idea": {
          const [placeholder] = sourceEventId
            ? await tx.select().from(eggbookIdeas).where(and(
                eq(eggbookIdeas.userId, userId),
                eq(eggbookIdeas.sourceEventId, sourceEventId),
                blank(eggbookIdeas.title),
                blank(eggbookIdeas.content),
              )).limit(1)
            : [];
          if (placeholder) {
            await tx.update(eggbookIdeas)
              .set({ title: entry.payload.title, content: entry.payload.content, sourceEventIds, updatedAt: now })
              .where(eq(eggbookIdeas.id, placeholder.id));
            ids.push(placeholder.id);
            break;
          }
          const id = uuidv4();
          await tx.insert(eggbookIdeas).values({
            ...common,
            id,
            title: entry.payload.title,
            content: entry.payload.content,
            updatedAt: now,
          });
          ids.push(id);
          break;
        }
        case "todo": {
          const id = uuidv4();
          await tx.insert(eggbookTodos).values({ ...common, id, title: entry.payload.title, updatedAt: now });
          ids.push(id);
          break;
        }
        case "notification": {
          const id = uuidv4();
          await tx.insert(eggbookNotifications).values({
            ...common,
            id,
            title: entry.payload.title,
            notifyAt: entry.payload.notifyAt ?? now,
            updatedAt: now,
          });
          ids.push(id);
          break;
        }
        case "comment": {
          const id = uuidv4();
          await tx.insert(eggbookComments).values({
            ...common,
            id,
            content: entry.payload.content,
            date: entry.payload.date ?? now.slice(0, 10),
          });
          ids.push(id);
          break;
        }
      }
    }

    return ids;
  }

  // ============================================
  // IDEAS
  // ============================================

  async listIdeas(userId: string): Promise<EggbookIdea[]> {
    return wrapDbOperation("listIdeas", async () => {
      return await this.db.select().from(eggbookIdeas)
        .where(eq(eggbookIdeas.userId, userId))
        .orderBy(desc(eggbookIdeas.createdAt));
    });
  }

  async getIdea(userId: string, id: string): Promise<EggbookIdea | undefined> {
    return wrapDbOperation("getIdea", async () => {
      const [result] = await this.db.select().from(eggbookIdeas)
        .where(and(eq(eggbookIdeas.id, id), eq(eggbookIdeas.userId, userId)));
      return result;
    });
  }

  async createIdea(userId: string, idea: NewIdea): Promise<EggbookIdea> {
    return wrapDbOperation("createIdea", async () => {
      const now = getNow();
      const [result] = await this.db.insert(eggbookIdeas).values({
        id: uuidv4(),
        userId,
        title: idea.title,
        content: idea.content,
        createdAt: now,
        updatedAt: now,
      }).returning();
      return result;
    });
  }

  async deleteIdea(userId: string, id: string): Promise<boolean> {
    return wrapDbOperation("deleteIdea", async () => {
      const deleted = await this.db.delete(eggbookIdeas)
        .where(and(eq(eggbookIdeas.id, id), eq(eggbookIdeas.userId, userId)))
        .returning({ id: eggbookIdeas.id });
      return deleted.length > 0;
    });
  }

  async getIdeaForEvent(userId: string, eventId: string): Promise<EggbookIdea | undefined> {
    return wrapDbOperation("getIdeaForEvent", async () => {
      const [result] = await this.db.select().from(eggbookIdeas)
        .where(and(eq(eggbookIdeas.userId, userId), eq(eggbookIdeas.sourceEventId, eventId)))
        .orderBy(asc(eggbookIdeas.createdAt))
        .limit(1);
      return result;
    });
  }

  async upsertPlaceholderIdea(event: EventRecord): Promise<EggbookIdea> {
    const media = {
      screenRecordingUrl: event.screenRecordingUrl || event.recordingUrl,
      recordingUrl: event.recordingUrl,
      audioUrl: event.audioUrl,
    };
    const existing = await this.getIdeaForEvent(event.userId, event.id);

    return wrapDbOperation("upsertPlaceholderIdea", async () => {
      const now = getNow();
      if (existing) {
        const [result] = await this.db.update(eggbookIdeas)
          .set({ ...media, updatedAt: now })
          .where(eq(eggbookIdeas.id, existing.id))
          .returning();
        return result;
      }
      const [result] = await this.db.insert(eggbookIdeas).values({
        ...media,
        id: uuidv4(),
        userId: event.userId,
        sourceEventId: event.id,
        sourceEventIds: [event.id],
        title: null,
        content: null,
        createdAt: now,
        updatedAt: now,
      }).returning();
      return result;
    });
  }

  async countIdeas(userId: string): Promise<IdeaCounts> {
    return wrapDbOperation("countIdeas", async () => {
      const [row] = await this.db.select({
        total: sql<number>`count(*)::int`,
        placeholders: sql<number>`count(*) filter (where coalesce(trim(${eggbookIdeas.title}), '') = '' or coalesce(trim(${eggbookIdeas.content}), '') = '')::int`,
      }).from(eggbookIdeas).where(eq(eggbookIdeas.userId, userId));
      return { total: row?.total ?? 0, placeholders: row?.placeholders ?? 0 };
    });
  }

  // ============================================
  // TODOS
  // ============================================

  async listTodos(userId: string): Promise<EggbookTodo[]> {
    return wrapDbOperation("listTodos", async () => {
      return await this.db.select().from(eggbookTodos)
        .where(eq(eggbookTodos.userId, userId))
        .orderBy(desc(eggbookTodos.createdAt));
    });
  }

  async getTodo(userId: string, id: string): Promise<EggbookTodo | undefined> {
    return wrapDbOperation("getTodo", async () => {
      const [result] = await this.db.select().from(eggbookTodos)
        .where(and(eq(eggbookTodos.id, id), eq(eggbookTodos.userId, userId)));
      return result;
    });
  }

  async createTodo(userId: string, title: string): Promise<EggbookTodo> {
    return wrapDbOperation("createTodo", async () => {
      const now = getNow();
      const [result] = await this.db.insert(eggbookTodos).values({
        id: uuidv4(),
        userId,
        title,
        createdAt: now,
        updatedAt: now,
      }).returning();
      return result;
    });
  }

  async updateTodo(userId: string, id: string, changes: TodoChanges): Promise<EggbookTodo | undefined> {
    return wrapDbOperation("updateTodo", async () => {
      const [result] = await this.db.update(eggbookTodos)
        .set({ ...changes, updatedAt: getNow() })
        .where(and(eq(eggbookTodos.id, id), eq(eggbookTodos.userId, userId)))
        .returning();
      return result;
    });
  }

  async deleteTodo(userId: string, id: string): Promise<boolean> {
    return wrapDbOperation("deleteTodo", async () => {
      const deleted = await this.db.delete(eggbookTodos)
        .where(and(eq(eggbookTodos.id, id), eq(eggbookTodos.userId, userId)))
        .returning({ id: eggbookTodos.id });
      return deleted.length > 0;
    });
  }

  // ============================================
  // NOTIFICATIONS
  // ============================================

  async listNotifications(userId: string): Promise<EggbookNotification[]> {
    return wrapDbOperation("listNotifications", async () => {
      return await this.db.select().from(eggbookNotifications)
        .where(eq(eggbookNotifications.userId, userId))
        .orderBy(asc(eggbookNotifications.notifyAt));
    });
  }

  async createNotification(userId: string, notification: NewNotification): Promise<EggbookNotification> {
    return wrapDbOperation("createNotification", async () => {
      const now = getNow();
      const [result] = await this.db.insert(eggbookNotifications).values({
        id: uuidv4(),
        userId,
        todoId: notification.todoId,
        title: notification.title,
        notifyAt: notification.notifyAt,
        createdAt: now,
        updatedAt: now,
      }).returning();
      return result;
    });
  }

  async rescheduleNotification(userId: string, id: string, notifyAt: string): Promise<EggbookNotification | undefined> {
    return wrapDbOperation("rescheduleNotification", async () => {
      const [result] = await this.db.update(eggbookNotifications)
        .set({ notifyAt, updatedAt: getNow() })
        .where(and(eq(eggbookNotifications.id, id), eq(eggbookNotifications.userId, userId)))
        .returning();
      return result;
    });
  }

  async deleteNotification(userId: string, id: string): Promise<boolean> {
    return wrapDbOperation("deleteNotification", async () => {
      const deleted = await this.db.delete(eggbookNotifications)
        .where(and(eq(eggbookNotifications.id, id), eq(eggbookNotifications.userId, userId)))
        .returning({ id: eggbookNotifications.id });
      return deleted.length > 0;
    });
  }

  async ensureNotification(userId: string, title: string, notifyAt: string): Promise<boolean> {
    return wrapDbOperation("ensureNotification", async () => {
      const [existing] = await this.db.select({ id: eggbookNotifications.id }).from(eggbookNotifications)
        .where(and(eq(eggbookNotifications.userId, userId), eq(eggbookNotifications.title, title)))
        .limit(1);
      if (existing) {
        return false;
      }
      await this.createNotification(userId, { title, notifyAt, todoId: null });
      return true;
    });
  }

  // ============================================
  // COMMENTS
  // ============================================

  async listComments(userId: string, startDate: string, endDate: string): Promise<EggbookComment[]> {
    return wrapDbOperation("listComments", async () => {
      return await this.db.select().from(eggbookComments)
        .where(and(
          eq(eggbookComments.userId, userId),
          gte(eggbookComments.date, startDate),
          lt(eggbookComments.date, endDate),
        ))
        .orderBy(desc(eggbookComments.createdAt));
    });
  }

  async createComment(userId: string, comment: NewComment): Promise<EggbookComment> {
    return wrapDbOperation("createComment", async () => {
      const [result] = await this.db.insert(eggbookComments).values({
        ...comment,
        id: uuidv4(),
        userId,
        createdAt: getNow(),
      }).returning();
      return result;
    });
  }

  async upsertComment(userId: string, comment: NewComment): Promise<boolean> {
    const content = comment.content.trim();
    if (!content) {
      return false;
    }
    const eggName = comment.isCommunity ? (comment.eggName ?? "").trim() : null;
    const eggComment = comment.isCommunity ? (comment.eggComment ?? "").trim() : null;

    return wrapDbOperation("upsertComment", async () => {
      const [existing] = await this.db.select({ id: eggbookComments.id }).from(eggbookComments)
        .where(and(
          eq(eggbookComments.userId, userId),
          eq(eggbookComments.date, comment.date),
          eq(eggbookComments.isCommunity, comment.isCommunity),
          eq(eggbookComments.content, content),
          eggName === null ? isNull(eggbookComments.eggName) : eq(eggbookComments.eggName, eggName),
          eggComment === null ? isNull(eggbookComments.eggComment) : eq(eggbookComments.eggComment, eggComment),
        ))
        .limit(1);
      if (existing) {
        return false;
      }
      await this.createComment(userId, { ...comment, content, eggName, eggComment });
      return true;
    });
  }

  async getGenerationState(userId: string, date: string): Promise<EggbookCommentGeneration | undefined> {
    return wrapDbOperation("getGenerationState", async () => {
      const [result] = await this.db.select().from(eggbookCommentGenerations)
        .where(and(eq(eggbookCommentGenerations.userId, userId), eq(eggbookCommentGenerations.date, date)));
      return result;
    });
  }

  async getOrCreateGenerationState(userId: string, date: string): Promise<EggbookCommentGeneration> {
    const existing = await this.getGenerationState(userId, date);
    if (existing) {
      return existing;
    }

    await wrapDbOperation("createGenerationState", async () => {
      const now = getNow();
      await this.db.insert(eggbookCommentGenerations).values({
        id: uuidv4(),
        userId,
        date,
        createdAt: now,
        updatedAt: now,
      }).onConflictDoNothing();
    });

    const created = await this.getGenerationState(userId, date);
    if (!created) {
      throw new PersistenceError(`Generation state for ${date} missing after insert`, "getOrCreateGenerationState");
    }
    return created;
  }

  async updateGenerationState(id: string, fields: CommentGenerationFields): Promise<EggbookCommentGeneration> {
    const updated = await wrapDbOperation("updateGenerationState", async () => {
      const [result] = await this.db.update(eggbookCommentGenerations)
        .set({ ...fields, updatedAt: getNow() })
        .where(eq(eggbookCommentGenerations.id, id))
        .returning();
      return result;
    });
    if (!updated) {
      throw new PersistenceError(`Generation state ${id} not found`, "updateGenerationState");
    }
    return updated;
  }

  async listSignalsForDay(userId: string, startIso: string, endIso: string): Promise<DaySignals> {
    return wrapDbOperation("listSignalsForDay", async () => {
      const [ideas, todos, notifications] = await Promise.all([
        this.db.select().from(eggbookIdeas).where(and(
          eq(eggbookIdeas.userId, userId),
          gte(eggbookIdeas.createdAt, startIso),
          lt(eggbookIdeas.createdAt, endIso),
        )),
        this.db.select().from(eggbookTodos).where(and(
          eq(eggbookTodos.userId, userId),
          gte(eggbookTodos.createdAt, startIso),
          lt(eggbookTodos.createdAt, endIso),
        )),
        this.db.select().from(eggbookNotifications).where(and(
          eq(eggbookNotifications.userId, userId),
          gte(eggbookNotifications.createdAt, startIso),
          lt(eggbookNotifications.createdAt, endIso),
        )),
      ]);
      return { ideas, todos, notifications };
    });
  }

  async deleteCommentDataBefore(userId: string, date: string): Promise<void> {
    await wrapDbOperation("deleteCommentDataBefore", async () => {
      await this.db.delete(eggbookComments)
        .where(and(eq(eggbookComments.userId, userId), lt(eggbookComments.date, date)));
      await this.db.delete(eggbookCommentGenerations)
        .where(and(eq(eggbookCommentGenerations.userId, userId), lt(eggbookCommentGenerations.date, date)));
    });
  }
}

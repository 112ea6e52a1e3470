import { pgTable, text, boolean, integer, real, jsonb, index, uniqueIndex } from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Users table (anonymous accounts)
export const users = pgTable("users", {
  id: text("id").primaryKey(),
  createdAt: text("created_at").notNull(),
});

export type User = typeof users.$inferSelect;

// Devices table - a device id belongs to exactly one user
export const devices = pgTable("devices", {
  id: text("id").primaryKey(),
  userId: text("user_id").notNull().references(() => users.id),
  deviceModel: text("device_model"),
  os: text("os"),
  language: text("language"),
  timezone: text("timezone"),
  createdAt: text("created_at").notNull(),
});

export type Device = typeof devices.$inferSelect;

export const deviceRegistrationSchema = z.object({
  device_id: z.string().min(1),
  device_model: z.string(),
  os: z.string(),
  language: z.string(),
  timezone: z.string(),
});

export type DeviceRegistration = z.infer<typeof deviceRegistrationSchema>;

// Memories table
export const memories = pgTable("memories", {
  id: text("id").primaryKey(),
  userId: text("user_id").notNull().references(() => users.id),
  type: text("type").notNull(),
  content: text("content").notNull(),
  importance: real("importance").notNull().default(0),
  createdAt: text("created_at").notNull(),
});

export const insertMemorySchema = createInsertSchema(memories).omit({
  id: true,
  userId: true,
  createdAt: true,
});

export type InsertMemory = z.infer<typeof insertMemorySchema>;
export type Memory = typeof memories.$inferSelect;

// ============================================
// EVENTS (ingestion + pipeline status)
// ============================================

export const eventStatuses = ["pending", "transcribing", "processed", "failed"] as const;
export type EventStatus = typeof eventStatuses[number];

export const events = pgTable("events", {
  id: text("id").primaryKey(),
  userId: text("user_id").notNull().references(() => users.id),
  deviceId: text("device_id").notNull(),
  audioUrl: text("audio_url"),
  screenRecordingUrl: text("screen_recording_url"),
  // Deprecated alias of screen_recording_url, kept in sync for older clients
  recordingUrl: text("recording_url"),
  transcript: text("transcript"),
  durationSec: real("duration_sec").notNull().default(0),
  eventAt: text("event_at").notNull(),
  status: text("status", { enum: eventStatuses }).notNull().default("pending"),
  aiAttempts: integer("ai_attempts").notNull().default(0),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
}, (table) => ({
  userStatusIdx: index("events_user_status_idx").on(table.userId, table.status),
  userEventAtIdx: index("events_user_event_at_idx").on(table.userId, table.eventAt),
}));

export type EventRecord = typeof events.$inferSelect;
export type InsertEvent = typeof events.$inferInsert;

export type EventFields = Partial<Pick<EventRecord,
  | "audioUrl"
  | "screenRecordingUrl"
  | "recordingUrl"
  | "transcript"
  | "durationSec"
  | "eventAt"
  | "status"
  | "aiAttempts"
>>;

export const createEventRequestSchema = z.object({
  device_id: z.string().min(1),
  audio_url: z.string().nullish(),
  screen_recording_url: z.string().nullish(),
  // Deprecated, kept for older clients
  recording_url: z.string().nullish(),
  transcript: z.string().nullish(),
  duration_sec: z.number().nonnegative().nullish(),
  event_at: z.string().datetime({ offset: true }).nullish(),
});

export const updateEventRequestSchema = z.object({
  audio_url: z.string().nullish(),
  screen_recording_url: z.string().nullish(),
  recording_url: z.string().nullish(),
  transcript: z.string().nullish(),
  duration_sec: z.number().nonnegative().nullish(),
  event_at: z.string().datetime({ offset: true }).nullish(),
  status: z.string().nullish(),
});

export type CreateEventRequest = z.infer<typeof createEventRequestSchema>;
export type UpdateEventRequest = z.infer<typeof updateEventRequestSchema>;

// ============================================
// EGGBOOK (derived personal log)
// ============================================

export const eggbookIdeas = pgTable("eggbook_ideas", {
  id: text("id").primaryKey(),
  userId: text("user_id").notNull().references(() => users.id),
  sourceEventId: text("source_event_id"),
  sourceEventIds: jsonb("source_event_ids").$type<string[]>().notNull().default(sql`'[]'::jsonb`),
  title: text("title"),
  content: text("content"),
  screenRecordingUrl: text("screen_recording_url"),
  recordingUrl: text("recording_url"),
  audioUrl: text("audio_url"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
}, (table) => ({
  userSourceIdx: index("eggbook_ideas_user_source_idx").on(table.userId, table.sourceEventId),
}));

export type EggbookIdea = typeof eggbookIdeas.$inferSelect;

export const eggbookTodos = pgTable("eggbook_todos", {
  id: text("id").primaryKey(),
  userId: text("user_id").notNull().references(() => users.id),
  sourceEventId: text("source_event_id"),
  sourceEventIds: jsonb("source_event_ids").$type<string[]>().notNull().default(sql`'[]'::jsonb`),
  title: text("title").notNull(),
  isAccepted: boolean("is_accepted").notNull().default(false),
  isPinned: boolean("is_pinned").notNull().default(false),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
});

export type EggbookTodo = typeof eggbookTodos.$inferSelect;

export const eggbookNotifications = pgTable("eggbook_notifications", {
  id: text("id").primaryKey(),
  userId: text("user_id").notNull().references(() => users.id),
  sourceEventId: text("source_event_id"),
  sourceEventIds: jsonb("source_event_ids").$type<string[]>().notNull().default(sql`'[]'::jsonb`),
  todoId: text("todo_id"),
  title: text("title").notNull(),
  notifyAt: text("notify_at").notNull(),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
});

export type EggbookNotification = typeof eggbookNotifications.$inferSelect;

export const eggbookComments = pgTable("eggbook_comments", {
  id: text("id").primaryKey(),
  userId: text("user_id").notNull().references(() => users.id),
  sourceEventId: text("source_event_id"),
  sourceEventIds: jsonb("source_event_ids").$type<string[]>().notNull().default(sql`'[]'::jsonb`),
  content: text("content").notNull(),
  date: text("date").notNull(), // YYYY-MM-DD
  isCommunity: boolean("is_community").notNull().default(false),
  eggName: text("egg_name"),
  eggComment: text("egg_comment"),
  createdAt: text("created_at").notNull(),
}, (table) => ({
  userDateIdx: index("eggbook_comments_user_date_idx").on(table.userId, table.date),
}));

export type EggbookComment = typeof eggbookComments.$inferSelect;

export const commentGenerationStatuses = ["idle", "generating", "ready", "failed"] as const;
export type CommentGenerationStatus = typeof commentGenerationStatuses[number];

export const eggbookCommentGenerations = pgTable("eggbook_comment_generations", {
  id: text("id").primaryKey(),
  userId: text("user_id").notNull().references(() => users.id),
  date: text("date").notNull(),
  status: text("status", { enum: commentGenerationStatuses }).notNull().default("idle"),
  triggerMode: text("trigger_mode", { enum: ["auto", "manual"] }),
  hasInput: boolean("has_input").notNull().default(false),
  activeDurationSec: real("active_duration_sec").notNull().default(0),
  errorMessage: text("error_message"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
}, (table) => ({
  userDateUnique: uniqueIndex("eggbook_comment_generations_user_date_idx").on(table.userId, table.date),
}));

export type EggbookCommentGeneration = typeof eggbookCommentGenerations.$inferSelect;

// ============================================
// EGGBOOK REQUEST SCHEMAS
// ============================================

const dateOnly = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

export const createIdeaRequestSchema = z.object({
  title: z.string().nullish(),
  content: z.string().min(1),
});

export const createTodoRequestSchema = z.object({
  title: z.string().min(1),
});

export const updateTodoRequestSchema = z.object({
  title: z.string().min(1).optional(),
  isAccepted: z.boolean().optional(),
});

export const scheduleTodoRequestSchema = z.object({
  notify_at: z.string().datetime({ offset: true }),
});

export const createNotificationRequestSchema = z.object({
  title: z.string().min(1),
  notify_at: z.string().datetime({ offset: true }),
  todo_id: z.string().nullish(),
});

export const updateNotificationRequestSchema = z.object({
  notify_at: z.string().datetime({ offset: true }),
});

export const createCommentRequestSchema = z.object({
  content: z.string().nullish(),
  egg_name: z.string().nullish(),
  egg_comment: z.string().nullish(),
  date: dateOnly.nullish(),
  isCommunity: z.boolean().nullish(),
});

export const listCommentsQuerySchema = z.object({
  date: dateOnly.optional(),
  days: z.coerce.number().int().min(1).max(7).default(7),
});

export const commentGenerationRequestSchema = z.object({
  date: dateOnly.nullish(),
});

export const commentGenerationQuerySchema = z.object({
  date: dateOnly.optional(),
});

export const uploadRecordingRequestSchema = z.object({
  content_type: z.string().min(1),
  filename: z.string().nullish(),
  size_bytes: z.number().int().nonnegative().nullish(),
});

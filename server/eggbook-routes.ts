import type { Express } from "express";
import {
  commentGenerationQuerySchema,
  commentGenerationRequestSchema,
  createCommentRequestSchema,
  createIdeaRequestSchema,
  createNotificationRequestSchema,
  createTodoRequestSchema,
  listCommentsQuerySchema,
  scheduleTodoRequestSchema,
  updateNotificationRequestSchema,
  updateTodoRequestSchema,
  type EggbookComment,
  type EggbookIdea,
  type EggbookNotification,
  type EggbookTodo,
} from "@shared/schema";
import { getUserId, requireUser } from "./deviceAuth";
import { HttpError, asyncHandler, parseBody, parseQuery } from "./middleware/apiValidation";
import { addDays } from "./pipeline/dailyComments";
import type { AppDeps } from "./routes";

export function ideaToDict(idea: EggbookIdea) {
  return {
    id: idea.id,
    sourceEventId: idea.sourceEventId,
    sourceEventIds: idea.sourceEventIds,
    title: idea.title,
    content: idea.content,
    screenRecordingUrl: idea.screenRecordingUrl,
    recordingUrl: idea.recordingUrl,
    audioUrl: idea.audioUrl,
    createdAt: idea.createdAt,
    updatedAt: idea.updatedAt,
  };
}

export function todoToDict(todo: EggbookTodo) {
  return {
    id: todo.id,
    sourceEventId: todo.sourceEventId,
    title: todo.title,
    isAccepted: todo.isAccepted,
    isPinned: todo.isPinned,
    createdAt: todo.createdAt,
    updatedAt: todo.updatedAt,
  };
}

export function notificationToDict(notification: EggbookNotification) {
  return {
    id: notification.id,
    sourceEventId: notification.sourceEventId,
    title: notification.title,
    todoId: notification.todoId,
    notifyAt: notification.notifyAt,
    createdAt: notification.createdAt,
    updatedAt: notification.updatedAt,
  };
}

/** Community comments display the persona's words, not the "Name: words" line. */
export function commentToDict(comment: EggbookComment) {
  return {
    id: comment.id,
    content: comment.isCommunity && comment.eggComment ? comment.eggComment : comment.content,
    eggName: comment.eggName,
    eggComment: comment.eggComment,
    date: comment.date,
    isCommunity: comment.isCommunity,
    createdAt: comment.createdAt,
  };
}

export function registerEggbookRoutes(app: Express, deps: AppDeps): void {
  const { storage, tokens, pipeline, config } = deps;
  const auth = requireUser(tokens);
  const { dailyComments } = pipeline;

  // ============================================
  // SYNC STATUS
  // ============================================

  app.get("/v1/eggbook/sync-status", auth, asyncHandler(async (_req, res) => {
    const { total, placeholders } = await storage.countIdeas(getUserId(res));
    const processing = placeholders > 0;
    res.json({
      status: "ok",
      lastSyncAt: null,
      processing,
      hasUpdates: !processing && total > 0,
    });
  }));

  // ============================================
  // IDEAS
  // ============================================

  app.get("/v1/eggbook/ideas", auth, asyncHandler(async (_req, res) => {
    const ideas = await storage.listIdeas(getUserId(res));
    res.json({ items: ideas.map(ideaToDict) });
  }));

  app.post("/v1/eggbook/ideas", auth, asyncHandler(async (req, res) => {
    const body = parseBody(createIdeaRequestSchema, req);
    const idea = await storage.createIdea(getUserId(res), { title: body.title ?? null, content: body.content });
    res.json({ item: ideaToDict(idea) });
  }));

  app.get("/v1/eggbook/ideas/:id", auth, asyncHandler(async (req, res) => {
    const idea = await storage.getIdea(getUserId(res), req.params.id);
    if (!idea) {
      throw new HttpError(404, "Idea not found");
    }
    res.json({ item: ideaToDict(idea) });
  }));

  app.delete("/v1/eggbook/ideas/:id", auth, asyncHandler(async (req, res) => {
    if (!(await storage.deleteIdea(getUserId(res), req.params.id))) {
      throw new HttpError(404, "Idea not found");
    }
    res.json({ message: "Idea deleted" });
  }));

  // ============================================
  // TODOS
  // ============================================

  app.get("/v1/eggbook/todos", auth, asyncHandler(async (_req, res) => {
    const todos = await storage.listTodos(getUserId(res));
    res.json({ items: todos.map(todoToDict) });
  }));

  app.post("/v1/eggbook/todos", auth, asyncHandler(async (req, res) => {
    const body = parseBody(createTodoRequestSchema, req);
    const todo = await storage.createTodo(getUserId(res), body.title);
    res.json({ item: todoToDict(todo) });
  }));

  app.patch("/v1/eggbook/todos/:id", auth, asyncHandler(async (req, res) => {
    const body = parseBody(updateTodoRequestSchema, req);
    const todo = await storage.updateTodo(getUserId(res), req.params.id, body);
    if (!todo) {
      throw new HttpError(404, "Todo not found");
    }
    res.json({ item: todoToDict(todo) });
  }));

  app.delete("/v1/eggbook/todos/:id", auth, asyncHandler(async (req, res) => {
    if (!(await storage.deleteTodo(getUserId(res), req.params.id))) {
      throw new HttpError(404, "Todo not found");
    }
    res.json({ message: "Todo deleted" });
  }));

  app.post("/v1/eggbook/todos/:id/accept", auth, asyncHandler(async (req, res) => {
    const todo = await storage.updateTodo(getUserId(res), req.params.id, { isAccepted: true, isPinned: true });
    if (!todo) {
      throw new HttpError(404, "Todo not found");
    }
    res.json({ item: todoToDict(todo) });
  }));

  app.post("/v1/eggbook/todos/:id/pin", auth, asyncHandler(async (req, res) => {
    const todo = await storage.updateTodo(getUserId(res), req.params.id, { isPinned: true });
    if (!todo) {
      throw new HttpError(404, "Todo not found");
    }
    res.json({ item: todoToDict(todo) });
  }));

  app.post("/v1/eggbook/todos/:id/schedule", auth, asyncHandler(async (req, res) => {
    const userId = getUserId(res);
    const body = parseBody(scheduleTodoRequestSchema, req);
    const todo = await storage.getTodo(userId, req.params.id);
    if (!todo) {
      throw new HttpError(404, "Todo not found");
    }
    const notification = await storage.createNotification(userId, {
      title: todo.title,
      notifyAt: new Date(body.notify_at).toISOString(),
      todoId: todo.id,
    });
    res.json({ item: notificationToDict(notification) });
  }));

  // ============================================
  // NOTIFICATIONS
  // ============================================

  app.get("/v1/eggbook/notifications", auth, asyncHandler(async (_req, res) => {
    const notifications = await storage.listNotifications(getUserId(res));
    res.json({ items: notifications.map(notificationToDict) });
  }));

  app.post("/v1/eggbook/notifications", auth, asyncHandler(async (req, res) => {
    const body = parseBody(createNotificationRequestSchema, req);
    const notification = await storage.createNotification(getUserId(res), {
      title: body.title,
      notifyAt: new Date(body.notify_at).toISOString(),
      todoId: body.todo_id ?? null,
    });
    res.json({ item: notificationToDict(notification) });
  }));

  app.patch("/v1/eggbook/notifications/:id", auth, asyncHandler(async (req, res) => {
    const body = parseBody(updateNotificationRequestSchema, req);
    const notification = await storage.rescheduleNotification(
      getUserId(res),
      req.params.id,
      new Date(body.notify_at).toISOString()
    );
    if (!notification) {
      throw new HttpError(404, "Notification not found");
    }
    res.json({ item: notificationToDict(notification) });
  }));

  app.delete("/v1/eggbook/notifications/:id", auth, asyncHandler(async (req, res) => {
    if (!(await storage.deleteNotification(getUserId(res), req.params.id))) {
      throw new HttpError(404, "Notification not found");
    }
    res.json({ message: "Notification deleted" });
  }));

  // ============================================
  // COMMENTS
  // ============================================

  app.get("/v1/eggbook/comments", auth, asyncHandler(async (req, res) => {
    const userId = getUserId(res);
    const query = parseQuery(listCommentsQuerySchema, req);

    const today = dailyComments.today();
    const cutoff = addDays(today, -(config.commentRetentionDays - 1));
    await storage.deleteCommentDataBefore(userId, cutoff);

    const requested = query.date ?? today;
    const start = requested < cutoff ? cutoff : requested;
    const comments = await storage.listComments(userId, start, addDays(start, query.days));

    res.json({
      myEgg: comments.filter((comment) => !comment.isCommunity).map(commentToDict),
      community: comments.filter((comment) => comment.isCommunity).map(commentToDict),
    });
  }));

  app.post("/v1/eggbook/comments", auth, asyncHandler(async (req, res) => {
    const body = parseBody(createCommentRequestSchema, req);
    const isCommunity = body.isCommunity ?? false;
    const content = isCommunity ? body.egg_comment || body.content : body.content;
    if (!content) {
      throw new HttpError(400, "content is required");
    }

    const comment = await storage.createComment(getUserId(res), {
      content,
      date: body.date ?? dailyComments.today(),
      isCommunity,
      eggName: isCommunity ? body.egg_name ?? null : null,
      eggComment: isCommunity ? body.egg_comment ?? null : null,
    });
    res.json({ item: commentToDict(comment) });
  }));

  const generationState = asyncHandler(async (req, res) => {
    const query = parseQuery(commentGenerationQuerySchema, req);
    const view = await dailyComments.getState(getUserId(res), query.date ?? dailyComments.today());
    res.json(view);
  });
  app.get("/v1/eggbook/comments/generation", auth, generationState);
  app.get("/v1/eggbook/comments/status", auth, generationState);

  app.post("/v1/eggbook/comments/generate", auth, asyncHandler(async (req, res) => {
    const body = parseBody(commentGenerationRequestSchema, req);
    const view = await dailyComments.trigger(getUserId(res), body.date ?? dailyComments.today(), { manual: true });
    res.json(view);
  }));
}

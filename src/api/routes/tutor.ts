import { Router } from "express";
import { ConversationRegistry } from "../conversationRegistry";
import {
  SESSION_EXPIRED_MESSAGE,
  TutorConversation,
  TutorDependencies,
  TutorEvent,
} from "../../domain/tutorConversation";
import { createTutorConversation } from "../../services/tutorFactory";

interface MessageRequest {
  content?: unknown;
}

interface UploadRequest {
  fileName?: unknown;
  data?: unknown; // base64
}

/**
 * Routes for tutor conversations:
 *
 * POST   /sessions                      start a conversation
 * POST   /sessions/:studentId/messages  send a message (NDJSON event stream)
 * POST   /sessions/:studentId/upload    submit a pitch document
 * DELETE /sessions/:studentId           end a conversation
 */
export function createTutorRouter(
  deps: TutorDependencies,
  registry: ConversationRegistry = new ConversationRegistry()
): Router {
  const router = Router();

  // Messages for one conversation are handled strictly in arrival order
  const queues = new Map<string, Promise<void>>();

  function enqueue(studentId: string, task: () => Promise<void>): Promise<void> {
    const previous = queues.get(studentId) ?? Promise.resolve();
    const next = previous.then(task, task);
    queues.set(studentId, next);
    return next.finally(() => {
      if (queues.get(studentId) === next) {
        queues.delete(studentId);
      }
    });
  }

  function findConversation(studentId: string): TutorConversation | null {
    return registry.get(studentId);
  }

  // POST /api/tutor/sessions - Start a new conversation
  router.post("/sessions", async (req, res) => {
    try {
      const conversation = createTutorConversation(deps);
      const events: TutorEvent[] = [];
      const studentId = await conversation.start((event) => events.push(event));
      registry.add(studentId, conversation);

      res.status(201).json({ studentId, events });
    } catch (error) {
      console.error("[API] Error starting session:", error);
      res.status(500).json({ error: "Failed to start session" });
    }
  });

  // POST /api/tutor/sessions/:studentId/messages - Stream the tutor's response
  router.post("/sessions/:studentId/messages", async (req, res) => {
    const { studentId } = req.params;
    const { content } = req.body as MessageRequest;

    if (typeof content !== "string" || content.trim() === "") {
      return res.status(400).json({ error: "content is required" });
    }

    const conversation = findConversation(studentId);
    if (!conversation) {
      return res.status(404).json({ error: SESSION_EXPIRED_MESSAGE });
    }

    res.setHeader("Content-Type", "application/x-ndjson");
    res.setHeader("Transfer-Encoding", "chunked");

    try {
      await enqueue(studentId, () =>
        conversation.handleMessage(content, (event) => {
          res.write(JSON.stringify(event) + "\n");
        })
      );
    } catch (error) {
      console.error("[API] Error handling message:", error);
    }
    res.end();
  });

  // POST /api/tutor/sessions/:studentId/upload - Evaluate a pitch document
  router.post("/sessions/:studentId/upload", async (req, res) => {
    const { studentId } = req.params;
    const { fileName, data } = req.body as UploadRequest;

    const conversation = findConversation(studentId);
    if (!conversation) {
      return res.status(404).json({ error: SESSION_EXPIRED_MESSAGE });
    }

    const file =
      typeof fileName === "string" && typeof data === "string" && fileName && data
        ? { name: fileName, data: Buffer.from(data, "base64") }
        : null;

    try {
      const events: TutorEvent[] = [];
      await enqueue(studentId, () => conversation.submitPitch(file, (event) => events.push(event)));
      res.json({ events });
    } catch (error) {
      console.error("[API] Error evaluating upload:", error);
      res.status(500).json({ error: "Failed to evaluate upload" });
    }
  });

  // DELETE /api/tutor/sessions/:studentId - End a conversation once pending messages are done
  router.delete("/sessions/:studentId", async (req, res) => {
    const { studentId } = req.params;

    const conversation = findConversation(studentId);
    if (!conversation) {
      return res.status(404).json({ error: SESSION_EXPIRED_MESSAGE });
    }

    const events: TutorEvent[] = [];
    await enqueue(studentId, async () => conversation.end((event) => events.push(event)));
    if (findConversation(studentId) === conversation) {
      registry.remove(studentId);
    }
    res.json({ events });
  });

  return router;
}

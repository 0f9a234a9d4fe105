import { TutorConversation } from "../domain/tutorConversation";

/**
 * In-memory lookup of live conversations by student ID.
 * IDs are random and unchecked, so a new conversation with a colliding ID
 * replaces the older one.
 */
export class ConversationRegistry {
  private conversations = new Map<string, TutorConversation>();

  add(studentId: string, conversation: TutorConversation): void {
    if (this.conversations.has(studentId)) {
      console.warn(`[API] Student ID ${studentId} reassigned to a new conversation`);
    }
    this.conversations.set(studentId, conversation);
  }

  get(studentId: string): TutorConversation | null {
    return this.conversations.get(studentId) ?? null;
  }

  remove(studentId: string): void {
    this.conversations.delete(studentId);
  }
}

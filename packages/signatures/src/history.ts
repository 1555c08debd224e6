/**
 * Conversation history for multi-turn prompts.
 */

import {
  createAssistantMessage,
  createSystemMessage,
  createUserMessage,
  type Message,
} from "@sigil/llm-client";

export class History {
  private _messages: Message[] = [];
  /** Maximum number of messages kept; 0 means unlimited. */
  readonly maxSize: number;

  constructor(maxSize = 0) {
    this.maxSize = Math.max(0, maxSize);
  }

  /** Append a message, dropping the oldest ones past `maxSize`. */
  add(message: Message): void {
    this._messages.push(message);
    if (this.maxSize > 0 && this._messages.length > this.maxSize) {
      this._messages = this._messages.slice(this._messages.length - this.maxSize);
    }
  }

  addUserMessage(text: string): void {
    this.add(createUserMessage(text));
  }

  addAssistantMessage(text: string): void {
    this.add(createAssistantMessage(text));
  }

  addSystemMessage(text: string): void {
    this.add(createSystemMessage(text));
  }

  /** All messages, oldest first. */
  get(): Message[] {
    return [...this._messages];
  }

  /** The most recent `n` messages, oldest first. */
  last(n: number): Message[] {
    if (n <= 0) return [];
    return this._messages.slice(-n);
  }

  clear(): void {
    this._messages = [];
  }

  get size(): number {
    return this._messages.length;
  }

  isEmpty(): boolean {
    return this._messages.length === 0;
  }

  clone(): History {
    const copy = new History(this.maxSize);
    for (const message of this._messages) copy.add(message);
    return copy;
  }
}

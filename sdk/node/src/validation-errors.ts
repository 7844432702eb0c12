/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Validation messages reported by the server with a 422.
 */

import { Document, Format, isMapping, isSequence } from './document';
import { DecodeError } from './errors';
import { attributeKeyFor } from './naming';

const BASE = 'base';

export interface AttributeOwner {
  has(name: string): boolean;
}

export class ValidationErrors {
  private messages = new Map<string, string[]>();

  constructor(private readonly owner: AttributeOwner) {}

  get size(): number {
    let count = 0;
    for (const list of this.messages.values()) count += list.length;
    return count;
  }

  add(attribute: string, message: string): void {
    const list = this.messages.get(attribute);
    if (list) list.push(message);
    else this.messages.set(attribute, [message]);
  }

  addToBase(message: string): void {
    this.add(BASE, message);
  }

  clear(): void {
    this.messages.clear();
  }

  on(attribute: string): string[] {
    return [...(this.messages.get(attribute) ?? [])];
  }

  fullMessages(): string[] {
    const out: string[] = [];
    for (const [key, list] of this.messages) {
      for (const message of list) out.push(key === BASE ? message : `${key} ${message}`);
    }
    return out;
  }

  /** `["First can't be blank", ...]`: the leading word names the attribute. */
  fromArray(messages: Document[]): void {
    for (const message of messages) {
      if (typeof message !== 'string') continue;
      const [word] = message.split(/\s+/, 1);
      const key = attributeKeyFor(word);
      if (word && this.owner.has(key)) {
        this.add(key, message.slice(word.length + 1));
      } else {
        this.addToBase(message);
      }
    }
  }

  /** `{ first: ["can't be blank"] }` */
  fromHash(hash: Record<string, Document>): void {
    for (const [key, value] of Object.entries(hash)) {
      const list = isSequence(value) ? value : [value];
      for (const message of list) {
        if (typeof message !== 'string') continue;
        if (this.owner.has(key)) this.add(key, message);
        else this.addToBase(message);
      }
    }
  }

  fromDocument(document: Document): void {
    if (isSequence(document)) {
      this.fromArray(document);
      return;
    }
    if (!isMapping(document)) return;

    const errors = document['errors'];
    if (errors === undefined) {
      this.fromHash(document);
    } else if (isSequence(errors)) {
      this.fromArray(errors);
    } else if (isMapping(errors)) {
      this.fromHash(errors);
    }
  }

  /** Read messages from a raw response body; text that is not a document becomes one base message. */
  fromBody(body: string, format: Format): void {
    if (!body.trim()) return;
    try {
      this.fromDocument(format.decode(body));
    } catch (e) {
      if (!(e instanceof DecodeError)) throw e;
      this.addToBase(body.trim());
    }
  }
}

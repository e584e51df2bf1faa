// Contact Directory - Monitored contacts behind an atomically swapped snapshot

import { ValidationError } from './errors.js';
import { isNumericId } from './config.js';
import type { MonitoredContact } from './types.js';

export type ContactSnapshot = readonly Readonly<MonitoredContact>[];

export class ContactDirectory {
  private current: ContactSnapshot = Object.freeze([]);
  private listeners = new Set<(snapshot: ContactSnapshot) => void>();

  constructor(initial: MonitoredContact[] = []) {
    this.replace(initial);
  }

  /**
   * The list as of now. Readers hold on to the returned array for a whole
   * cycle; writers never touch it again, they swap in a new one.
   */
  snapshot(): ContactSnapshot {
    return this.current;
  }

  get size(): number {
    return this.current.length;
  }

  replace(contacts: MonitoredContact[]): void {
    const seen = new Set<string>();
    const next: Readonly<MonitoredContact>[] = [];
    for (const contact of contacts) {
      const checked = checkContact(contact);
      if (seen.has(checked.nickname)) {
        throw new ValidationError(`Duplicate monitored contact "${checked.nickname}"`);
      }
      seen.add(checked.nickname);
      next.push(checked);
    }
    this.swap(next);
  }

  /** Adds a contact, or updates the numeric id of one with the same nickname. */
  add(contact: MonitoredContact): void {
    const checked = checkContact(contact);
    const existing = this.current.findIndex((c) => c.nickname === checked.nickname);
    if (existing === -1) {
      this.swap([...this.current, checked]);
      return;
    }
    const next = [...this.current];
    next[existing] = checked;
    this.swap(next);
  }

  remove(nickname: string): boolean {
    const next = this.current.filter((c) => c.nickname !== nickname);
    if (next.length === this.current.length) return false;
    this.swap(next);
    return true;
  }

  /** Exact, case-sensitive match on numeric id first, then on nickname. */
  resolve(target: string, snapshot: ContactSnapshot = this.current): Readonly<MonitoredContact> | undefined {
    return resolveContact(target, snapshot);
  }

  onChange(listener: (snapshot: ContactSnapshot) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private swap(next: Readonly<MonitoredContact>[]): void {
    this.current = Object.freeze(next);
    for (const listener of this.listeners) listener(this.current);
  }
}

export function resolveContact(
  target: string,
  snapshot: ContactSnapshot,
): Readonly<MonitoredContact> | undefined {
  return (
    snapshot.find((c) => c.userId !== undefined && c.userId === target) ??
    snapshot.find((c) => c.nickname === target)
  );
}

function checkContact(contact: MonitoredContact): Readonly<MonitoredContact> {
  const nickname = contact.nickname.trim();
  if (!nickname) {
    throw new ValidationError('Monitored contact needs a nickname');
  }
  if (contact.userId !== undefined && !isNumericId(contact.userId)) {
    throw new ValidationError(`Contact "${nickname}" has a non-numeric id "${contact.userId}"`);
  }
  return Object.freeze(
    contact.userId === undefined ? { nickname } : { nickname, userId: contact.userId },
  );
}

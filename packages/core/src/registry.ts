/**
 * Syntax Registry
 * Per-buffer activation for hosts. Enabling a buffer that already has
 * an active session keeps that session as is.
 */

import { createError } from './error-classes.js';
import { HighlightSession, type SessionOptions } from './session.js';

export interface EnableEvent {
  bufferId: string;
  /** True when the buffer already had an active session */
  reused: boolean;
}

export interface DisableEvent {
  bufferId: string;
}

export interface RegistryCallbacks {
  onEnable?: (event: EnableEvent) => void;
  onDisable?: (event: DisableEvent) => void;
}

export interface RegistryOptions {
  callbacks?: RegistryCallbacks;
  /** Options passed to every session the registry creates */
  session?: SessionOptions;
}

export interface SyntaxRegistry {
  /** Start highlighting a buffer, or return its active session */
  enable(bufferId: string, text: string): HighlightSession;
  /** Stop highlighting a buffer. Returns false if it was not enabled. */
  disable(bufferId: string): boolean;
  isEnabled(bufferId: string): boolean;
  /** @throws HighlightError HL-S001 when the buffer is not enabled */
  session(bufferId: string): HighlightSession;
  bufferIds(): string[];
}

export function createSyntaxRegistry(options?: RegistryOptions): SyntaxRegistry {
  const sessions = new Map<string, HighlightSession>();
  const callbacks = options?.callbacks ?? {};

  return {
    enable(bufferId, text) {
      const existing = sessions.get(bufferId);
      if (existing !== undefined) {
        callbacks.onEnable?.({ bufferId, reused: true });
        return existing;
      }

      const session = new HighlightSession(text, options?.session);
      sessions.set(bufferId, session);
      callbacks.onEnable?.({ bufferId, reused: false });
      return session;
    },

    disable(bufferId) {
      const removed = sessions.delete(bufferId);
      if (removed) {
        callbacks.onDisable?.({ bufferId });
      }
      return removed;
    },

    isEnabled(bufferId) {
      return sessions.has(bufferId);
    },

    session(bufferId) {
      const session = sessions.get(bufferId);
      if (session === undefined) {
        throw createError('HL-S001', { bufferId });
      }
      return session;
    },

    bufferIds() {
      return [...sessions.keys()];
    },
  };
}

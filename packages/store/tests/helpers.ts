/**
 * Shared fixtures for store tests.
 */

import type { RecordCodec } from "../src/types.js";
import {
  StoreError,
  defineCollection,
  defineSequence,
  defineStringCollection,
} from "../src/types.js";

export interface Note {
  id: number;
  text: string;
}

export const noteCodec: RecordCodec<Note> = {
  parse(data) {
    if (
      typeof data === "object" &&
      data !== null &&
      "id" in data &&
      typeof data.id === "number" &&
      "text" in data &&
      typeof data.text === "string"
    ) {
      return { id: data.id, text: data.text };
    }
    throw new Error("not a note");
  },
};

export const notes = defineCollection("notes", noteCodec);
export const tags = defineStringCollection("tags");
export const lines = defineSequence("lines");

/** Same name as `notes`, but accepts anything. */
export const looseNotes = defineCollection<unknown>("notes", {
  parse: (data) => data,
});

export const collections = [notes, tags, lines];

/** Run `fn` and return the StoreError code it throws. */
export function storeErrorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof StoreError) {
      return err.code;
    }
    throw err;
  }
  return undefined;
}

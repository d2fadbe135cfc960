// Voice Relay - Audio Cache
// In-memory store for synthesized audio that has no remote URL of its own
// (e.g. OpenAI speech returns raw bytes). Entries are served back over
// GET /audio/:id and evicted oldest-first once the cache is full.
//
// Privacy: audio is held in process memory only, never written to disk.

import { v4 as uuidv4 } from "uuid";

export const DEFAULT_AUDIO_CACHE_SIZE = 100;

export interface CachedAudio {
  data: Buffer;
  contentType: string;
  createdAt: Date;
}

export class AudioCache {
  private entries: Map<string, CachedAudio> = new Map();
  private readonly maxEntries: number;

  constructor(maxEntries: number = DEFAULT_AUDIO_CACHE_SIZE) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new Error(`Audio cache size must be a positive integer, got ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Stores audio and returns its id. */
  put(data: Buffer, contentType: string = "audio/mpeg"): string {
    const id = uuidv4();
    this.entries.set(id, { data, contentType, createdAt: new Date() });

    // Map iteration order is insertion order, so the first key is the oldest.
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return id;
  }

  get(id: string): CachedAudio | undefined {
    return this.entries.get(id);
  }
}

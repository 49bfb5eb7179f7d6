// src/services/upload/upload.events.ts

import { EventEmitter } from "events";

export type UploadEvent =
  | {
      type: "progress";
      uploadId: string;
      bytesReceived: number;
      totalSize: number;
      progress: number;
    }
  | {
      type: "completed";
      uploadId: string;
      path: string;
      sizeBytes: number;
    }
  | {
      type: "cancelled";
      uploadId: string;
    }
  | {
      type: "expired";
      uploadId: string;
    }
  | {
      type: "failed";
      uploadId: string;
      error: string;
    };

export type UploadEventListener = (event: UploadEvent) => void;

export function isTerminalEvent(event: UploadEvent): boolean {
  return event.type !== "progress";
}

/**
 * Best-effort notification sink. Listener errors are contained so a
 * broken subscriber cannot fail an upload.
 */
export class UploadEvents {
  private readonly emitter = new EventEmitter();

  constructor(private readonly onListenerError?: (err: unknown) => void) {
    this.emitter.setMaxListeners(0);
  }

  emit(event: UploadEvent) {
    this.emitter.emit(event.uploadId, event);
  }

  subscribe(uploadId: string, listener: UploadEventListener): () => void {
    const guarded = (event: UploadEvent) => {
      try {
        listener(event);
      } catch (err) {
        this.onListenerError?.(err);
      }
    };

    this.emitter.on(uploadId, guarded);
    return () => {
      this.emitter.off(uploadId, guarded);
    };
  }

  listenerCount(uploadId: string): number {
    return this.emitter.listenerCount(uploadId);
  }
}

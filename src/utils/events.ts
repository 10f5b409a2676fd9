import { EventEmitter } from 'events';
import type { ChunkProgress, ProcessingResult, StateTransition } from '../types/result.types.js';

/**
 * Event types emitted by the pipeline
 */
export interface VetDocEvents {
    'pipeline:start': { documentId: string; filename: string; byteLength: number };
    'pipeline:state': StateTransition;
    'pipeline:complete': ProcessingResult;
    'pipeline:error': { documentId: string; error: Error };

    'ocr:chunk': ChunkProgress;

    'image:skipped': {
        documentId: string;
        pageNumber: number;
        reason: 'decode' | 'storage';
        error: string;
    };
}

/**
 * Type-safe event emitter for the pipeline
 */
export class VetDocEventEmitter extends EventEmitter {
    emit<K extends keyof VetDocEvents>(
        event: K,
        data: VetDocEvents[K]
    ): boolean {
        return super.emit(event, data);
    }

    on<K extends keyof VetDocEvents>(
        event: K,
        listener: (data: VetDocEvents[K]) => void
    ): this {
        return super.on(event, listener);
    }

    once<K extends keyof VetDocEvents>(
        event: K,
        listener: (data: VetDocEvents[K]) => void
    ): this {
        return super.once(event, listener);
    }

    off<K extends keyof VetDocEvents>(
        event: K,
        listener: (data: VetDocEvents[K]) => void
    ): this {
        return super.off(event, listener);
    }
}

/**
 * Create a new event emitter instance
 */
export function createEventEmitter(): VetDocEventEmitter {
    return new VetDocEventEmitter();
}

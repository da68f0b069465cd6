/**
 * Run progress statistics: chapters against the expected total,
 * images per chapter, throughput and time remaining
 */

import { formatDuration } from '../utils/time';
import type { RunEvent } from '../types';

export interface ProgressStats {
    completed: number;
    total?: number;
    images: number;
    averageImages: number;
    chaptersPerMinute: number;
    /** Absent until the total and a throughput are known */
    etaMs?: number;
}

/**
 * Computes statistics from raw counters
 */
export function progressStats(completed: number, total: number | undefined, images: number, elapsedMs: number): ProgressStats {
    const averageImages = images / Math.max(1, completed);
    const chaptersPerMinute = elapsedMs > 0 ? (completed * 60000) / elapsedMs : 0;
    const remaining = total !== undefined ? Math.max(0, total - completed) : undefined;

    let etaMs: number | undefined;
    if (remaining === 0) {
        etaMs = 0;
    } else if (remaining !== undefined && completed > 0 && elapsedMs > 0) {
        etaMs = (remaining * elapsedMs) / completed;
    }

    return { completed, total, images, averageImages, chaptersPerMinute, etaMs };
}

/**
 * Follows the events of one run and keeps the counters for progressStats
 */
export class RunProgress {
    private readonly started: number;
    private completed = 0;
    private images = 0;
    private total: number | undefined;

    constructor(private readonly now: () => number = Date.now) {
        this.started = now();
    }

    record(event: RunEvent): void {
        switch (event.type) {
            case 'chapter_started':
                this.total = event.total ?? this.total;
                break;
            case 'chapter_completed':
                this.completed++;
                this.images += event.result.imageCount;
                this.total = event.total ?? this.total;
                break;
            default:
                break;
        }
    }

    stats(): ProgressStats {
        return progressStats(this.completed, this.total, this.images, this.now() - this.started);
    }
}

/**
 * `3/10 | 12.0 img/ch | 1.5 ch/min | ETA 04:40`; parts that are not known yet are left out
 */
export function formatProgress(stats: ProgressStats): string {
    const parts = [stats.total !== undefined ? `${stats.completed}/${stats.total}` : `${stats.completed} done`];
    if (stats.completed > 0) {
        parts.push(`${stats.averageImages.toFixed(1)} img/ch`, `${stats.chaptersPerMinute.toFixed(1)} ch/min`);
    }
    if (stats.etaMs !== undefined) {
        parts.push(`ETA ${formatDuration(stats.etaMs / 1000)}`);
    }
    return parts.join(' | ');
}

import type { Track } from "../types/track";
import { logger } from "../utils/logger";

export type LibraryChangeReason = "added" | "removed" | "replaced" | "cleared";

export interface LibraryChangedEvent {
    reason: LibraryChangeReason;
    trackIds: string[];
    trackCount: number;
}

type LibraryListener = (event: LibraryChangedEvent) => void;

/**
 * In-memory track collection. Readers get snapshots; listeners are notified in
 * registration order after each effective change.
 */
export class MusicLibrary {
    private tracks: Track[] = [];
    private readonly listeners: LibraryListener[] = [];

    getAllTracks(): Track[] {
        return [...this.tracks];
    }

    getTrack(id: string): Track | undefined {
        return this.tracks.find((track) => track.id === id);
    }

    get size(): number {
        return this.tracks.length;
    }

    addTrack(track: Track): boolean {
        return this.addTracks([track]) === 1;
    }

    /** Adds tracks whose ids are not present yet. Returns how many were added. */
    addTracks(tracks: readonly Track[]): number {
        const knownIds = new Set(this.tracks.map((track) => track.id));
        const added: Track[] = [];

        for (const track of tracks) {
            if (knownIds.has(track.id)) {
                logger.debug(`[Library] Track ${track.id} already exists, skipping`);
                continue;
            }
            knownIds.add(track.id);
            added.push(track);
        }

        if (added.length > 0) {
            this.tracks = [...this.tracks, ...added];
            this.notify("added", added.map((track) => track.id));
        }
        return added.length;
    }

    removeTrack(id: string): boolean {
        const remaining = this.tracks.filter((track) => track.id !== id);
        if (remaining.length === this.tracks.length) {
            return false;
        }
        this.tracks = remaining;
        this.notify("removed", [id]);
        return true;
    }

    /** Swaps in a new track list wholesale, e.g. after metadata patches. */
    replaceTracks(tracks: readonly Track[]): void {
        this.tracks = [...tracks];
        this.notify(
            "replaced",
            tracks.map((track) => track.id)
        );
    }

    clear(): void {
        if (this.tracks.length === 0) return;
        const ids = this.tracks.map((track) => track.id);
        this.tracks = [];
        this.notify("cleared", ids);
    }

    subscribe(listener: LibraryListener): () => void {
        this.listeners.push(listener);
        return () => {
            const index = this.listeners.indexOf(listener);
            if (index >= 0) {
                this.listeners.splice(index, 1);
            }
        };
    }

    private notify(reason: LibraryChangeReason, trackIds: string[]): void {
        const event: LibraryChangedEvent = {
            reason,
            trackIds,
            trackCount: this.tracks.length,
        };
        // Copy so a listener unsubscribing mid-dispatch does not skip another.
        [...this.listeners].forEach((listener) => {
            try {
                listener(event);
            } catch (error) {
                logger.warn("[Library] Change listener failed:", error);
            }
        });
    }
}

export const musicLibrary = new MusicLibrary();

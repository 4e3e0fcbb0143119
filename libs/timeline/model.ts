import type { Timestamp } from "./time";
import { compareTimestamps } from "./time";

export type DischargeStatus = "alive" | "deceased";

export interface ClinicalEvent {
    code: string;
    vocabulary: string;
    table: string;
    episodeId: string;
    personId: string;
    timestamp: Timestamp | null;
    attributes?: Record<string, string>;
}

export interface Episode {
    episodeId: string;
    /** Owner's id. The owning Person is reached through the timeline, not held here. */
    personId: string;
    encounterTime: Timestamp;
    dischargeTime: Timestamp | null;
    dischargeStatus: DischargeStatus;
    events: Record<string, ClinicalEvent[]>;
}

export interface Person {
    personId: string;
    birthTime: Timestamp;
    deathTime: Timestamp | null;
    gender: string | null;
    ethnicity: string | null;
    episodes: Episode[];
}

/** person id -> Person, in insertion order. */
export type Timeline = Map<string, Person>;

export function createPerson(fields: Omit<Person, "episodes">): Person {
    return { ...fields, episodes: [] };
}

export function compareEpisodes(a: Episode, b: Episode): number {
    const byTime = compareTimestamps(a.encounterTime, b.encounterTime);
    if (byTime !== 0) return byTime;
    return a.episodeId < b.episodeId ? -1 : a.episodeId > b.episodeId ? 1 : 0;
}

/** Inserts keeping encounter order; equal start times keep episode-id order. */
export function addEpisode(person: Person, episode: Episode): void {
    if (episode.personId !== person.personId) {
        throw new Error(`Episode ${episode.episodeId} belongs to ${episode.personId}, not ${person.personId}`);
    }
    let i = person.episodes.length;
    while (i > 0 && compareEpisodes(person.episodes[i - 1], episode) > 0) i--;
    person.episodes.splice(i, 0, episode);
}

export function appendEvent(episode: Episode, event: ClinicalEvent): void {
    const list = episode.events[event.table];
    if (list) list.push(event);
    else episode.events[event.table] = [event];
}

/** Global episode id -> Episode lookup across every person. */
export function indexEpisodes(timeline: Timeline): Map<string, Episode> {
    const index = new Map<string, Episode>();
    for (const person of timeline.values()) {
        for (const episode of person.episodes) index.set(episode.episodeId, episode);
    }
    return index;
}

export function availableTables(timeline: Timeline): string[] {
    const tables = new Set<string>();
    for (const person of timeline.values()) {
        for (const episode of person.episodes) {
            for (const table of Object.keys(episode.events)) tables.add(table);
        }
    }
    return [...tables].sort();
}

export function countEpisodes(timeline: Timeline): number {
    let n = 0;
    for (const person of timeline.values()) n += person.episodes.length;
    return n;
}

export function countEvents(timeline: Timeline, table?: string): number {
    let n = 0;
    for (const person of timeline.values()) {
        for (const episode of person.episodes) {
            for (const [name, events] of Object.entries(episode.events)) {
                if (table === undefined || name === table) n += events.length;
            }
        }
    }
    return n;
}

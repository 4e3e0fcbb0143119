import { appendEvent, indexEpisodes, type ClinicalEvent, type Episode, type Timeline } from "./model";

export interface AttachReport {
    attached: number;
    droppedUnknownPerson: number;
    droppedUnknownEpisode: number;
    droppedMalformed: number;
}

export function emptyAttachReport(): AttachReport {
    return { attached: 0, droppedUnknownPerson: 0, droppedUnknownEpisode: 0, droppedMalformed: 0 };
}

export function droppedTotal(report: AttachReport): number {
    return report.droppedUnknownPerson + report.droppedUnknownEpisode + report.droppedMalformed;
}

export function mergeAttachReports(a: AttachReport, b: AttachReport): AttachReport {
    return {
        attached: a.attached + b.attached,
        droppedUnknownPerson: a.droppedUnknownPerson + b.droppedUnknownPerson,
        droppedUnknownEpisode: a.droppedUnknownEpisode + b.droppedUnknownEpisode,
        droppedMalformed: a.droppedMalformed + b.droppedMalformed,
    };
}

/**
 * Appends each event to its episode's table list. Events naming a person
 * outside the timeline, or an episode that person does not own, are dropped
 * and counted. Every lookup happens before the append, so one bad reference
 * never touches its siblings.
 */
export function attachEvents(
    timeline: Timeline,
    events: Iterable<ClinicalEvent>,
    index: Map<string, Episode> = indexEpisodes(timeline),
): AttachReport {
    const report = emptyAttachReport();
    for (const event of events) {
        if (!event.personId || !event.episodeId || !event.table) {
            report.droppedMalformed++;
            continue;
        }
        if (!timeline.has(event.personId)) {
            report.droppedUnknownPerson++;
            continue;
        }
        const episode = index.get(event.episodeId);
        if (!episode || episode.personId !== event.personId) {
            report.droppedUnknownEpisode++;
            continue;
        }
        appendEvent(episode, event);
        report.attached++;
    }
    return report;
}

/** Flattens parser output (person id -> events) in person order. */
export function* eventsOf(eventsByPerson: Map<string, ClinicalEvent[]>): Generator<ClinicalEvent> {
    for (const events of eventsByPerson.values()) yield* events;
}

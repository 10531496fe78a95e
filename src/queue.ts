import {round2} from "./utils.ts";

export interface QueuedJob {
    id: number;
    estimatedPrintTimeMinutes: number;
}

export interface RunningJob {
    estimatedPrintTimeMinutes: number;
    startedAt: Date | null;
}

export interface JobTimeEstimate {
    jobId: number;
    estimatedStartTimeMinutes: number;
    estimatedDurationMinutes: number;
    estimatedStartDate: Date;
    estimatedCompletionDate: Date;
}

export interface QueueTimeEstimate {
    pendingJobsCount: number;
    estimatedCompletionTimeMinutes: number;
    estimatedCompletionDate: Date;
    jobEstimates: JobTimeEstimate[];
}

const MS_PER_MINUTE = 60_000;

const addMinutes = (date: Date, minutes: number) => new Date(date.getTime() + minutes * MS_PER_MINUTE);

/**
 * Minutes the running job still needs, never below zero. A job with no start
 * time is assumed to have just started.
 */
export function remainingMinutes(job: RunningJob, now: Date) {
    const elapsed = job.startedAt ? (now.getTime() - job.startedAt.getTime()) / MS_PER_MINUTE : 0;
    return Math.max(0, job.estimatedPrintTimeMinutes - elapsed);
}

/**
 * Plain FIFO: pending jobs run back to back in the given order after whatever
 * is on the printer now. No priorities, no gaps between jobs.
 */
export function estimateQueueCompletion(
    pendingJobs: readonly QueuedJob[],
    runningJob: RunningJob | null = null,
    now: Date = new Date(),
): QueueTimeEstimate {
    let cumulative = runningJob ? remainingMinutes(runningJob, now) : 0;
    const jobEstimates: JobTimeEstimate[] = [];

    for (const job of pendingJobs) {
        const start = cumulative,
            duration = job.estimatedPrintTimeMinutes;

        jobEstimates.push({
            jobId: job.id,
            estimatedStartTimeMinutes: round2(start),
            estimatedDurationMinutes: round2(duration),
            estimatedStartDate: addMinutes(now, start),
            estimatedCompletionDate: addMinutes(now, start + duration),
        });

        cumulative += duration;
    }

    return {
        pendingJobsCount: pendingJobs.length,
        estimatedCompletionTimeMinutes: round2(cumulative),
        estimatedCompletionDate: addMinutes(now, cumulative),
        jobEstimates,
    };
}

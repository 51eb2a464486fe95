/**
 * job-status core - Looks up background jobs
 */

import { z } from "zod";
import { NotFoundError } from "../../errors";
import type { JobRunner, JobSnapshot } from "../../pipeline";

export const jobStatusSchema = z.object({
  jobId: z
    .string()
    .optional()
    .describe("Id returned when the job was started; omit to list all retained jobs"),
});

export type JobStatusInput = z.infer<typeof jobStatusSchema>;

export const jobStatusDescription = `Show the status of background jobs (index_images, sync_payload with all=true). Returns one job when jobId is given, otherwise every retained job, oldest first.`;

/**
 * @throws NotFoundError for an unknown or evicted job id
 */
export function jobStatus(jobs: JobRunner, input: JobStatusInput): JobSnapshot | JobSnapshot[] {
  if (!input.jobId) return jobs.list();
  const snapshot = jobs.get(input.jobId);
  if (!snapshot) throw new NotFoundError(`Job '${input.jobId}' not found`);
  return snapshot;
}

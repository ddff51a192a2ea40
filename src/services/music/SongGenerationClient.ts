import { GenerationJob, SongStatus } from '../../models/SongStatus';

export interface SongGenerationClient {
  /** Submits a job and returns the vendor's job id. */
  startGeneration(job: GenerationJob): Promise<string>;
  /** Raw status payload for a job, including `choices` once rendered. */
  queryStatus(taskId: string): Promise<SongStatus>;
}

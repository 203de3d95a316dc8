import type { JobType } from './job-type.js';
import { DuplicateJobTypeError, UnknownJobTypeError } from './job-errors.js';

/**
 * Job types known to this process, by label.
 */
export class JobTypeRegistry {
  private types = new Map<string, JobType>();

  /**
   * @throws DuplicateJobTypeError if the label is already registered
   */
  register<TPayload>(jobType: JobType<TPayload>): void {
    if (this.types.has(jobType.label)) {
      throw new DuplicateJobTypeError(jobType.label);
    }
    this.types.set(jobType.label, jobType);
  }

  /**
   * @throws UnknownJobTypeError if no job type has this label
   */
  get(label: string): JobType {
    const jobType = this.types.get(label);
    if (!jobType) {
      throw new UnknownJobTypeError(label);
    }
    return jobType;
  }

  has(label: string): boolean {
    return this.types.has(label);
  }

  get labels(): string[] {
    return [...this.types.keys()];
  }

  all(): JobType[] {
    return [...this.types.values()];
  }
}

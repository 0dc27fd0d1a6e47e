import type { ImportJob, JobStore, JobUpdate } from "@/lib/jobs/types";

/**
 * Process-local job store. Each owner gets its own map, so one owner can never
 * read or touch another's jobs. Reads return copies.
 */
export class InMemoryJobStore implements JobStore {
  private readonly owners = new Map<string, Map<string, ImportJob>>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  private jobsFor(owner: string): Map<string, ImportJob> {
    let jobs = this.owners.get(owner);
    if (!jobs) {
      jobs = new Map();
      this.owners.set(owner, jobs);
    }
    return jobs;
  }

  async create(owner: string, id: string, job: ImportJob): Promise<void> {
    const jobs = this.jobsFor(owner);
    if (jobs.has(id)) {
      throw new Error(`Import job already exists: ${id}`);
    }
    jobs.set(id, structuredClone({ ...job, id, owner }));
  }

  async get(owner: string, id: string): Promise<ImportJob | null> {
    const job = this.owners.get(owner)?.get(id);
    return job ? structuredClone(job) : null;
  }

  async update(owner: string, id: string, partial: JobUpdate): Promise<boolean> {
    const jobs = this.owners.get(owner);
    const existing = jobs?.get(id);
    if (!jobs || !existing) return false;

    jobs.set(id, {
      ...existing,
      ...structuredClone(partial),
      updatedAt: this.now().toISOString(),
    });
    return true;
  }

  async listForOwner(owner: string): Promise<ImportJob[]> {
    const jobs = this.owners.get(owner);
    if (!jobs) return [];
    return [...jobs.values()]
      .map((job) => structuredClone(job))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }
}

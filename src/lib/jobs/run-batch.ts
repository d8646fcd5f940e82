/**
 * Run claimed jobs one at a time; jobs touching the same host configuration must not interleave.
 * Once a stop is requested the running job finishes and the rest go back through `release`.
 */
export async function runBatch<J extends { id: string }>(args: {
  jobs: J[];
  isStopping: () => boolean;
  run: (job: J) => Promise<void>;
  release: (jobIds: string[]) => Promise<void>;
}): Promise<{ ran: number; released: number }> {
  for (const [index, job] of args.jobs.entries()) {
    if (args.isStopping()) {
      const pending = args.jobs.slice(index).map((j) => j.id);
      await args.release(pending);
      return { ran: index, released: pending.length };
    }
    await args.run(job);
  }
  return { ran: args.jobs.length, released: 0 };
}

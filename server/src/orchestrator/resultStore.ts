import type { ProcessingResult } from "@shared/schema";

/**
 * Latest ProcessingResult per folder, for the lifetime of the process.
 */
export class ResultStore {
  private readonly results = new Map<string, ProcessingResult>();

  set(result: ProcessingResult): void {
    this.results.set(result.folder, result);
  }

  get(folder: string): ProcessingResult | undefined {
    return this.results.get(folder);
  }

  list(): ProcessingResult[] {
    return Array.from(this.results.values()).sort((a, b) => a.folder.localeCompare(b.folder));
  }
}

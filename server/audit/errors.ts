export class CrawlValidationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid crawl settings: ${problems.join("; ")}`);
    this.name = "CrawlValidationError";
    this.problems = problems;
  }
}

export class CrawlRunError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "CrawlRunError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

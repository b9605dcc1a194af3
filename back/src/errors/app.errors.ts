export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export class MalformedSalesRecordError extends Error {
  readonly rowIndex: number;

  constructor(rowIndex: number, detail: string) {
    super(`Malformed sales_data row ${rowIndex}: ${detail}`);
    this.name = "MalformedSalesRecordError";
    this.rowIndex = rowIndex;
  }
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`Gave up after ${attempts} attempts`, { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

export class DriverError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DriverError';
  }
}

export class DriverTimeoutError extends DriverError {
  constructor(message: string, operation: string, options?: { cause?: unknown }) {
    super(message, operation, options);
    this.name = 'DriverTimeoutError';
  }
}

export class ScenarioLoadError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ScenarioLoadError';
  }
}

export class ScenarioNotFoundError extends Error {
  constructor(public readonly scenarioName: string) {
    super(`Scenario ${scenarioName} not found`);
    this.name = 'ScenarioNotFoundError';
  }
}

export class AccountNotFoundError extends Error {
  constructor(public readonly accountName: string) {
    super(`Account ${accountName} not found`);
    this.name = 'AccountNotFoundError';
  }
}

export class QueueClosedError extends Error {
  constructor() {
    super('Event queue is closed');
    this.name = 'QueueClosedError';
  }
}

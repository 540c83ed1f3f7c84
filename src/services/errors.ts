export class DataLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataLoadError';
  }
}

export class FetchError extends DataLoadError {
  constructor(
    public status: number,
    public url: string,
    message: string,
    public statusText = ''
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export class DecodeError extends DataLoadError {
  constructor(public url: string, message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

export class SchemaError extends DataLoadError {
  /**
   * @param key - the offending field, or `<root>` when the payload itself is wrong
   * @param path - location inside the payload, e.g. `[3].callRecords[1].duration`
   */
  constructor(public key: string, public path: string, message: string) {
    super(message);
    this.name = 'SchemaError';
  }
}

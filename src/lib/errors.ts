export type PipelineStage = 'config' | 'ingest' | 'write' | 'analyze';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: PipelineStage,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(`[${stage}] ${message}`, options);
    this.name = 'PipelineError';
  }
}

export class MissingInputError extends PipelineError {
  constructor(
    public readonly feed: string,
    public readonly filePath: string
  ) {
    super(`Missing ${feed} feed: ${filePath}`, 'ingest', 'INPUT_MISSING');
    this.name = 'MissingInputError';
  }
}

export class FeedFormatError extends PipelineError {
  constructor(
    public readonly feed: string,
    public readonly missingColumns: string[]
  ) {
    super(
      `${feed} feed header is missing expected columns: ${missingColumns.join(', ')}`,
      'ingest',
      'FEED_HEADER_INVALID'
    );
    this.name = 'FeedFormatError';
  }
}

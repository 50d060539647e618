export interface CurationErrorOptions extends ErrorOptions {
  details?: Record<string, unknown>;
}

export class CurationError extends Error {
  readonly code: string;

  readonly details: Record<string, unknown>;

  constructor(code: string, message: string, options: CurationErrorOptions = {}) {
    const { details, ...errorOptions } = options;
    super(message, errorOptions);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details ?? {};
  }
}

export class EmptyArticleContentError extends CurationError {
  constructor(message: string, options: CurationErrorOptions = {}) {
    super('ARTICLE_CONTENT_EMPTY', message, options);
  }
}

export class ClassificationError extends CurationError {
  constructor(message: string, options: CurationErrorOptions = {}) {
    super('CLASSIFICATION_FAILED', message, options);
  }
}

export class AuthorResolutionError extends CurationError {
  constructor(message: string, options: CurationErrorOptions = {}) {
    super('AUTHOR_CREATE_FAILED', message, options);
  }
}

export class WorkspaceWriteError extends CurationError {
  constructor(message: string, options: CurationErrorOptions = {}) {
    super('WORKSPACE_WRITE_FAILED', message, options);
  }
}

export class WorkspaceRequestError extends CurationError {
  constructor(message: string, options: CurationErrorOptions = {}) {
    super('WORKSPACE_REQUEST_FAILED', message, options);
  }
}

export class ModelRequestError extends CurationError {
  constructor(message: string, options: CurationErrorOptions = {}) {
    super('MODEL_REQUEST_FAILED', message, options);
  }
}

export class SearchRequestError extends CurationError {
  constructor(message: string, options: CurationErrorOptions = {}) {
    super('SEARCH_REQUEST_FAILED', message, options);
  }
}

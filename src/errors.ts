import { ZodError } from 'zod';

/**
 * Error thrown when a conformance run cannot continue the current test case:
 * the transport failed, the server answered with something that is not a JMAP
 * response, or the test author asked for something the batch cannot provide.
 *
 * Server non-conformance is never thrown; it is collected as a {@link Violation}.
 */
export class ConformanceError extends Error {
  type: string;
  fix: string;

  constructor(message: string, type: string, fix: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConformanceError';
    this.type = type;
    this.fix = fix;
  }

  /**
   * Create a ConformanceError for HTTP-level errors (4xx, 5xx responses)
   */
  static httpError(status: number, statusText: string): ConformanceError {
    const message = `HTTP ${status}: ${statusText}`;

    if (status === 401) {
      return new ConformanceError(
        message,
        'unauthorized',
        'Check your credentials. For basic auth: verify JMAP_USERNAME and JMAP_PASSWORD. For bearer: verify JMAP_TOKEN is valid.'
      );
    }

    if (status === 403) {
      return new ConformanceError(
        message,
        'forbidden',
        'The test account does not have permission to access this resource.'
      );
    }

    if (status === 404) {
      return new ConformanceError(
        message,
        'notFound',
        'The JMAP endpoint was not found. Verify JMAP_SESSION_URL is correct.'
      );
    }

    if (status >= 500) {
      return new ConformanceError(
        message,
        'serverError',
        'The server under test failed while handling the request. Check its logs.'
      );
    }

    return new ConformanceError(
      message,
      'httpError',
      'An HTTP error occurred. Check the server URL and try again.'
    );
  }

  /**
   * Create a ConformanceError for timeout errors
   */
  static timeout(operation: string): ConformanceError {
    return new ConformanceError(
      `${operation} timed out`,
      'timeout',
      'The server took too long to answer. If it is expected to be slow, increase JMAP_REQUEST_TIMEOUT.'
    );
  }

  /**
   * Wrap any error raised by a transport during a round trip.
   * Errors that are already ConformanceErrors keep their type.
   */
  static transportFailure(cause: unknown): ConformanceError {
    if (cause instanceof ConformanceError) {
      return cause;
    }
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new ConformanceError(
      `Transport failure: ${detail}`,
      'transportFailure',
      'The request never completed. Check that the server is reachable.',
      { cause }
    );
  }

  /**
   * Create a ConformanceError for a response body that is not a JMAP response envelope
   */
  static malformedResponse(detail: string): ConformanceError {
    return new ConformanceError(
      `Malformed JMAP response: ${detail}`,
      'malformedResponse',
      'The server must answer with an object holding a methodResponses array of [name, arguments, callId] triples.'
    );
  }

  /**
   * Create a ConformanceError for a request the test author built incorrectly
   */
  static invalidRequest(detail: string): ConformanceError {
    return new ConformanceError(
      `Invalid request: ${detail}`,
      'invalidRequest',
      'Fix the request in the test: use { "Type/method": args } or [[name, args, callId?], ...].'
    );
  }

  /**
   * Create a ConformanceError for a creation id with no server-assigned id
   */
  static unresolvedCreationReference(creationId: string, reason: string): ConformanceError {
    return new ConformanceError(
      `Creation id "${creationId}" was not created: ${reason}`,
      'unresolvedCreationReference',
      'Assert that the creation succeeded before asking for its server id.'
    );
  }

  /**
   * Create a ConformanceError for an object the server returned in a shape the
   * harness cannot build a handle from
   */
  static invalidEntity(type: string, id: string, detail: string): ConformanceError {
    return new ConformanceError(
      `${type} ${id} is not a valid ${type}: ${detail}`,
      'invalidEntity',
      `The server must return every ${type} property with its RFC 8621 type.`
    );
  }

  static entityNotFound(type: string, id: string): ConformanceError {
    return new ConformanceError(
      `${type} ${id} was not found`,
      'notFound',
      'The server no longer knows this object. Check whether another test destroyed it.'
    );
  }

  static entityDestroyed(type: string, id: string): ConformanceError {
    return new ConformanceError(
      `${type} ${id} has been destroyed`,
      'entityDestroyed',
      'Do not use an entity handle after calling destroy().'
    );
  }

  static sessionNotInitialized(): ConformanceError {
    return new ConformanceError(
      'Session not initialized',
      'sessionNotInitialized',
      'Call fetchSession() before making requests.'
    );
  }
}

/** One step of a path into a JSON value: an object key or an array index. */
export type PathSegment = string | number;

/**
 * Server non-conformance found while checking a batch.
 * Violations are reported as assertion failures and never abort a run.
 */
export type Violation =
  | {
      kind: 'CorrelationMismatch';
      reason: 'missing' | 'extra' | 'duplicate';
      callId: string;
    }
  | {
      kind: 'CreationIdMismatch';
      callId: string;
      missing: string[];
      extra: string[];
      difference: string[];
    }
  | {
      kind: 'UnknownProperty';
      callId: string;
      creationId: string;
      properties: string[];
    }
  | {
      kind: 'StructuralMismatch';
      callId: string;
      path: PathSegment[];
      reason: string;
      expected: unknown;
      actual: unknown;
    };

/**
 * Render a JSON path as `$.created.new.id` or `$.list[0].name`.
 */
export function formatPath(path: PathSegment[]): string {
  return path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : `${acc}.${segment}`),
    '$'
  );
}

const CORRELATION_MESSAGES: Record<'missing' | 'extra' | 'duplicate', (callId: string) => string> = {
  missing: (callId) => `call ${callId}: no matching response`,
  extra: (callId) => `response ${callId}: no call with this id was sent`,
  duplicate: (callId) => `response ${callId}: call id answered more than once`,
};

/**
 * One-line description of a violation for diagnostics.
 */
export function describeViolation(violation: Violation): string {
  switch (violation.kind) {
    case 'CorrelationMismatch':
      return CORRELATION_MESSAGES[violation.reason](violation.callId);
    case 'CreationIdMismatch': {
      const parts: string[] = [];
      if (violation.missing.length > 0) {
        parts.push(`no result for ${violation.missing.join(', ')}`);
      }
      if (violation.extra.length > 0) {
        parts.push(`unexpected result for ${violation.extra.join(', ')}`);
      }
      return `call ${violation.callId}: creation ids do not match results (${parts.join('; ')})`;
    }
    case 'UnknownProperty':
      return `${violation.creationId} has unknown properties: ${violation.properties.join(', ')}`;
    case 'StructuralMismatch':
      return `call ${violation.callId}: ${formatPath(violation.path)}: ${violation.reason}`;
  }
}

export function formatStartupError(error: Error, sessionUrl?: string): string {
  // Handle Zod validation errors
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => {
      const field = issue.path.join('.');
      return `  ${field}: ${issue.message}`;
    });
    return [
      'Configuration validation failed:',
      ...issues,
      '',
      'Fix: Check your environment variables.',
      'For basic auth: JMAP_SESSION_URL, JMAP_USERNAME, JMAP_PASSWORD',
      'For bearer auth: JMAP_SESSION_URL, JMAP_AUTH_METHOD=bearer, JMAP_TOKEN',
    ].join('\n');
  }

  if (error instanceof ConformanceError) {
    return [`${error.message}`, '', `Fix: ${error.fix}`].join('\n');
  }

  const message = error.message.toLowerCase();

  // Authentication failures
  if (message.includes('401') || message.includes('unauthorized')) {
    return [
      'Authentication failed for JMAP server.',
      '',
      'Fix: Verify your credentials are correct.',
      'If using basic auth: check JMAP_USERNAME and JMAP_PASSWORD.',
      'If using bearer: check JMAP_TOKEN is valid and not expired.',
    ].join('\n');
  }

  // Timeout errors
  if (message.includes('timeout')) {
    const urlContext = sessionUrl ? ` ${sessionUrl}` : '';
    return [
      `Connection to${urlContext} timed out.`,
      '',
      'Fix: Check the JMAP server is running and accessible.',
      'Try accessing the session URL in a browser to verify it responds.',
    ].join('\n');
  }

  // Fallback
  return [
    `Unexpected error: ${error.message}`,
    '',
    'Fix: Check your configuration and try again.',
    'Verify JMAP_SESSION_URL and authentication settings.',
  ].join('\n');
}

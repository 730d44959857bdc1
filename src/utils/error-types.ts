export enum ErrorCategory {
  NETWORK = 'network',
  TIMEOUT = 'timeout',
  CONTENT = 'content',
  BROWSER = 'browser',
  ACCESS = 'access',
  UNKNOWN = 'unknown',
}

export enum ProcessingPhase {
  SESSION = 'session',
  NAVIGATION = 'navigation',
  CONTENT_WAIT = 'content_wait',
  INTERACTION = 'interaction',
  EXTRACTION = 'extraction',
}

export interface DetailedError {
  category: ErrorCategory;
  phase: ProcessingPhase;
  code: string;
  message: string;
  url: string;
  attempt?: number;
  timestamp: string;
  metadata?: Record<string, string | number | null>;
}

export interface ErrorDetectionRule {
  pattern: RegExp;
  category: ErrorCategory;
  code: string;
  extractMetadata?: (message: string) => Record<string, string | number | null>;
}

export const ERROR_DETECTION_RULES: readonly ErrorDetectionRule[] = [
  {
    pattern: /net::ERR_NAME_NOT_RESOLVED/,
    category: ErrorCategory.NETWORK,
    code: 'DNS_RESOLUTION_FAILED',
  },
  {
    pattern: /net::ERR_CONNECTION_(REFUSED|RESET|CLOSED)/,
    category: ErrorCategory.NETWORK,
    code: 'CONNECTION_FAILED',
  },
  {
    pattern: /net::ERR_INTERNET_DISCONNECTED|net::ERR_NETWORK_CHANGED/,
    category: ErrorCategory.NETWORK,
    code: 'NETWORK_UNAVAILABLE',
  },
  {
    pattern: /Navigation timeout of \d+ ms exceeded/,
    category: ErrorCategory.TIMEOUT,
    code: 'NAVIGATION_TIMEOUT',
    extractMetadata: (message) => {
      const match = message.match(/Navigation timeout of (\d+) ms/);
      return { timeoutMs: match ? parseInt(match[1], 10) : null };
    },
  },
  {
    pattern: /Timeout \d+ms exceeded|timed out/i,
    category: ErrorCategory.TIMEOUT,
    code: 'OPERATION_TIMEOUT',
  },
  {
    pattern: /Session closed|Target closed|Connection closed/,
    category: ErrorCategory.BROWSER,
    code: 'BROWSER_SESSION_CLOSED',
  },
  {
    pattern: /Protocol error/,
    category: ErrorCategory.BROWSER,
    code: 'BROWSER_PROTOCOL_ERROR',
  },
  {
    pattern: /Execution context was destroyed|detached Frame/,
    category: ErrorCategory.BROWSER,
    code: 'CONTEXT_DESTROYED',
  },
  {
    pattern: /Failed to launch the browser process|Could not find Chrome/i,
    category: ErrorCategory.BROWSER,
    code: 'BROWSER_LAUNCH_FAILED',
  },
  {
    pattern: /captcha|too many requests|rate limit/i,
    category: ErrorCategory.ACCESS,
    code: 'ACCESS_THROTTLED',
  },
  {
    pattern: /\b403\b|forbidden/i,
    category: ErrorCategory.ACCESS,
    code: 'ACCESS_FORBIDDEN',
  },
  {
    pattern: /\b404\b|not found/i,
    category: ErrorCategory.CONTENT,
    code: 'PAGE_NOT_FOUND',
  },
];

/**
 * Classifies a driver failure against {@link ERROR_DETECTION_RULES}.
 * Unmatched errors fall back to `UNKNOWN_ERROR`.
 */
export function detectErrorType(
  error: unknown,
  phase: ProcessingPhase,
  url: string,
  attempt?: number
): DetailedError {
  const message = error instanceof Error ? error.message : String(error);
  const timestamp = new Date().toISOString();

  for (const rule of ERROR_DETECTION_RULES) {
    if (rule.pattern.test(message)) {
      return {
        category: rule.category,
        phase,
        code: rule.code,
        message,
        url,
        attempt,
        timestamp,
        metadata: rule.extractMetadata ? rule.extractMetadata(message) : undefined,
      };
    }
  }

  return {
    category: ErrorCategory.UNKNOWN,
    phase,
    code: 'UNKNOWN_ERROR',
    message,
    url,
    attempt,
    timestamp,
  };
}

export function formatDetailedError(error: DetailedError): string {
  const parts = [
    `Category: ${error.category}`,
    `Phase: ${error.phase}`,
    `Code: ${error.code}`,
    `URL: ${error.url}`,
    `Message: ${error.message}`,
  ];
  if (error.attempt !== undefined) {
    parts.push(`Attempt: ${error.attempt}`);
  }
  if (error.metadata && Object.keys(error.metadata).length > 0) {
    parts.push(`Metadata: ${JSON.stringify(error.metadata)}`);
  }
  return parts.join(' | ');
}

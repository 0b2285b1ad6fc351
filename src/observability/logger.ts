type LogLevel = "trace" | "info" | "warn" | "error";

/** Ids that tie an event to the request, document, session or country it concerns. */
export interface CorrelationContext {
  requestId?: string | null;
  documentId?: string | null;
  sessionId?: string | null;
  country?: string | null;
}

type LogFields = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 10,
  info: 30,
  warn: 40,
  error: 50
};

// LOG_LEVEL is read on every event; unknown values mean "info".
const thresholdFromEnv = (): number => {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return raw === "trace" || raw === "info" || raw === "warn" || raw === "error"
    ? LEVEL_PRIORITY[raw]
    : LEVEL_PRIORITY.info;
};

const correlationFields = (context: CorrelationContext): LogFields => {
  const fields: LogFields = {};
  if (context.requestId) {
    fields.request_id = context.requestId;
  }
  if (context.documentId) {
    fields.document_id = context.documentId;
  }
  if (context.sessionId) {
    fields.session_id = context.sessionId;
  }
  if (context.country) {
    fields.country = context.country;
  }
  return fields;
};

const write = (level: LogLevel, event: string, context: CorrelationContext, fields: LogFields): void => {
  if (LEVEL_PRIORITY[level] < thresholdFromEnv()) {
    return;
  }
  const line = JSON.stringify({
    ts: new Date().toISOString(),
    level,
    event,
    ...correlationFields(context),
    ...fields
  });
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.info(line);
  }
};

export const logTrace = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  write("trace", event, context, fields);
};

export const logInfo = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  write("info", event, context, fields);
};

export const logWarn = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  write("warn", event, context, fields);
};

export const logError = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  write("error", event, context, fields);
};

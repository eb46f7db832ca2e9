/**
 * Structured logging for chart report events.
 *
 * Emits one JSON object per line on stdout.
 */

export type ChartLogEvent =
  | "chart.report.started"
  | "chart.report.succeeded"
  | "chart.report.failed"
  | "interpretation.lookup.failed"
  | "interpretation.seed.completed";

export type ChartLogData = {
  event: ChartLogEvent;
  chart_name?: string;
  birth_datetime?: string;
  body_count?: number;
  chart_shape?: string | null;
  distributions?: string[];
  table?: string;
  key?: string;
  error_code?: string;
  error_message?: string;
  [key: string]: unknown;
};

export type ChartLogLevel = "silent" | "error" | "info";

function resolveLevel(): ChartLogLevel {
  const raw = (process.env.NATAL_LOG_LEVEL ?? "info").toLowerCase();
  if (raw === "silent" || raw === "error") return raw;
  return "info";
}

function isFailure(event: ChartLogEvent): boolean {
  return event.endsWith(".failed");
}

export function chartLog(data: ChartLogData): void {
  const level = resolveLevel();
  if (level === "silent") return;
  if (level === "error" && !isFailure(data.event)) return;

  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  console.log(JSON.stringify(logEntry));
}

function errorFields(err: unknown): { error_code: string; error_message: string } {
  if (err instanceof Error) {
    return { error_code: err.name, error_message: err.message };
  }
  return { error_code: "UNKNOWN", error_message: String(err) };
}

export const chartLogHelpers = {
  reportStarted(params: { chart_name?: string; body_count: number }): void {
    chartLog({
      event: "chart.report.started",
      chart_name: params.chart_name,
      body_count: params.body_count,
    });
  },

  reportSucceeded(params: {
    chart_name?: string;
    chart_shape: string | null;
    distributions: string[];
  }): void {
    chartLog({
      event: "chart.report.succeeded",
      chart_name: params.chart_name,
      chart_shape: params.chart_shape,
      distributions: params.distributions,
    });
  },

  reportFailed(params: { chart_name?: string; birth_datetime?: string; error: unknown }): void {
    chartLog({
      event: "chart.report.failed",
      chart_name: params.chart_name,
      birth_datetime: params.birth_datetime,
      ...errorFields(params.error),
    });
  },

  lookupFailed(params: { table: string; key: string; error: unknown }): void {
    chartLog({
      event: "interpretation.lookup.failed",
      table: params.table,
      key: params.key,
      ...errorFields(params.error),
    });
  },

  seedCompleted(params: { table: string; rows: number }): void {
    chartLog({
      event: "interpretation.seed.completed",
      table: params.table,
      rows: params.rows,
    });
  },
};

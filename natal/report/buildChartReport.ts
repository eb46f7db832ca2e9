import {
  type ChartGeometry,
  type ChartShape,
  classifyGeometry,
  measureChartGeometry,
  MIN_SHAPE_BODIES,
  shapeLongitudes,
} from "../../astro/chart/detectChartShape.js";
import {
  type DistributionKey,
  detectChartDistributions,
  isValidHouse,
} from "../../astro/chart/detectDistributions.js";
import {
  type BirthInput,
  BirthInputSchema,
  birthDatetimeLabel,
  type PositionProvider,
} from "../../astro/positionProvider.js";
import {
  type NatalChart,
  NatalChartSchema,
} from "../../astro/schemas/natalChart.schema.js";
import { signFromLongitude } from "../../astro/zodiac.js";
import {
  InvalidBirthInputError,
  InvalidChartError,
  PositionProviderError,
} from "./errors.js";
import {
  type ChartInterpretations,
  fetchInterpretations,
} from "../interpretation/fetchInterpretations.js";
import type { InterpretationStore } from "../interpretation/interpretationStore.js";
import { chartLogHelpers } from "../logging/chartLog.js";

export interface ChartReport {
  name: string | null;
  birth_datetime: string | null;
  chart_shape: ChartShape | null;
  distributions: DistributionKey[];
  /** Null when too few canonical bodies were present to measure a shape. */
  geometry: ChartGeometry | null;
  interpretations: ChartInterpretations;
}

type Issue = { path: (string | number)[]; message: string };

function formatIssues(issues: readonly Issue[]): string[] {
  return issues.map((issue) =>
    issue.path.length
      ? `${issue.path.join(".")}: ${issue.message}`
      : issue.message
  );
}

function parseChart(input: unknown): NatalChart {
  const result = NatalChartSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidChartError(formatIssues(result.error.issues));
  }
  return result.data;
}

/**
 * Derive shape, distributions and interpretations for a chart.
 *
 * Too few bodies is not an error: the shape comes back null and the
 * distribution list empty.
 */
export async function buildChartReport(
  input: unknown,
  store: InterpretationStore
): Promise<ChartReport> {
  const chart = parseChart(input);
  chartLogHelpers.reportStarted({
    chart_name: chart.name,
    body_count: chart.bodies.length,
  });

  try {
    const lons = shapeLongitudes(chart.bodies);
    const geometry =
      lons.length >= MIN_SHAPE_BODIES ? measureChartGeometry(lons) : null;
    const chartShape = geometry ? classifyGeometry(geometry) : null;
    const distributions = detectChartDistributions(chart.bodies);

    const interpretations = await fetchInterpretations(store, {
      planet_sign_pairs: chart.bodies.map((b): [string, string] => [
        b.name,
        b.sign ?? signFromLongitude(b.longitude),
      ]),
      planet_house_pairs: chart.bodies.flatMap((b): Array<[string, number]> =>
        isValidHouse(b.house) ? [[b.name, b.house]] : []
      ),
      chart_shape: chartShape,
      distribution_keys: distributions,
    });

    chartLogHelpers.reportSucceeded({
      chart_name: chart.name,
      chart_shape: chartShape,
      distributions,
    });

    return {
      name: chart.name ?? null,
      birth_datetime: chart.birth_datetime ?? null,
      chart_shape: chartShape,
      distributions,
      geometry,
      interpretations,
    };
  } catch (err) {
    chartLogHelpers.reportFailed({ chart_name: chart.name, error: err });
    throw err;
  }
}

/**
 * Validate a birth moment, ask the provider for positions, then build the
 * report.
 */
export async function generateChartReport(
  input: unknown,
  deps: { provider: PositionProvider; store: InterpretationStore }
): Promise<ChartReport> {
  const parsed = BirthInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidBirthInputError(formatIssues(parsed.error.issues));
  }
  const birth: BirthInput = parsed.data;
  const label = birthDatetimeLabel(birth);

  let chart: NatalChart;
  try {
    chart = await deps.provider.computeChart(birth);
  } catch (err) {
    const failure = new PositionProviderError(label, err);
    chartLogHelpers.reportFailed({
      chart_name: birth.name,
      birth_datetime: label,
      error: failure,
    });
    throw failure;
  }

  return buildChartReport(
    {
      ...chart,
      name: chart.name ?? birth.name,
      birth_datetime: chart.birth_datetime ?? label,
    },
    deps.store
  );
}

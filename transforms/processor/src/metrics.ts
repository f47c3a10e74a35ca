/**
 * Metric shape conversions for the datapoint context.
 *
 * Both functions act on the metric that owns the current data point. They
 * run once per point, so only the first call on a metric converts it; the
 * following calls find the metric already in its target shape and skip.
 * The point objects themselves move to the new shape unchanged, which keeps
 * every other point's context valid.
 */

import {
	type DataPointContext,
	type FunctionFactory,
	BindError,
	standardFunctions,
} from '@telemorph/core';
import { AggregationTemporality, type NumberDataPoint, emptyValue } from '@telemorph/sdk';

const TEMPORALITIES: Readonly<Record<string, number>> = {
	delta: AggregationTemporality.DELTA,
	cumulative: AggregationTemporality.CUMULATIVE,
};

export function convertGaugeToSum(): FunctionFactory<DataPointContext> {
	return {
		name: 'convert_gauge_to_sum',
		params: [
			{ name: 'aggregation_temporality', kind: 'string' },
			{ name: 'is_monotonic', kind: 'bool' },
		],
		returns: 'empty',
		create(args) {
			const literal = args.string('aggregation_temporality');
			if (!Object.hasOwn(TEMPORALITIES, literal)) {
				throw new BindError(
					`convert_gauge_to_sum: unknown aggregation temporality ${JSON.stringify(literal)}; expected "delta" or "cumulative"`,
				);
			}
			const aggregationTemporality = TEMPORALITIES[literal];
			const isMonotonic = args.bool('is_monotonic');

			return (ctx) => {
				const metric = ctx.getMetric();
				if (metric.data.type !== 'gauge') return emptyValue();

				const snapshot: NumberDataPoint[] = [...metric.data.dataPoints];
				const dataPoints: NumberDataPoint[] = [];
				metric.data = { type: 'sum', aggregationTemporality, isMonotonic, dataPoints };
				for (const point of snapshot) dataPoints.push(point);
				return emptyValue();
			};
		},
	};
}

export function convertSumToGauge(): FunctionFactory<DataPointContext> {
	return {
		name: 'convert_sum_to_gauge',
		params: [],
		returns: 'empty',
		create() {
			return (ctx) => {
				const metric = ctx.getMetric();
				if (metric.data.type !== 'sum') return emptyValue();

				const snapshot: NumberDataPoint[] = [...metric.data.dataPoints];
				const dataPoints: NumberDataPoint[] = [];
				metric.data = { type: 'gauge', dataPoints };
				for (const point of snapshot) dataPoints.push(point);
				return emptyValue();
			};
		},
	};
}

/** Functions available to datapoint statements */
export function dataPointFunctions(): FunctionFactory<DataPointContext>[] {
	return [...standardFunctions<DataPointContext>(), convertGaugeToSum(), convertSumToGauge()];
}

import { monthsBetween, shiftMonthKey } from "../utils/months";
import { MonthPoint } from "./aggregation";

export interface ForecastPoint {
    month: string;
    amount: number;
    predicted: boolean;
}

export const FORECAST_DEGREE = 2;
export const FORECAST_HORIZON = 3;

/**
 * Least-squares polynomial coefficients, lowest power first. The degree is
 * capped at `xs.length - 1` so short series still get a defined fit.
 */
export function fitPolynomial(xs: readonly number[], ys: readonly number[], degree: number): number[] {
    if (xs.length === 0 || xs.length !== ys.length) {
        throw new RangeError("fitPolynomial needs the same, non-zero number of xs and ys");
    }

    const terms = Math.min(degree, xs.length - 1) + 1;

    // normal equations: (XᵀX) c = Xᵀy
    const matrix: number[][] = [];
    for (let row = 0; row < terms; row++) {
        const line: number[] = [];
        for (let col = 0; col < terms; col++) {
            line.push(xs.reduce((sum, x) => sum + x ** (row + col), 0));
        }
        line.push(xs.reduce((sum, x, i) => sum + ys[i] * x ** row, 0));
        matrix.push(line);
    }

    return solve(matrix, terms);
}

// Gauss-Jordan elimination with partial pivoting on an augmented matrix.
function solve(matrix: number[][], size: number): number[] {
    for (let col = 0; col < size; col++) {
        let pivot = col;
        for (let row = col + 1; row < size; row++) {
            if (Math.abs(matrix[row][col]) > Math.abs(matrix[pivot][col])) pivot = row;
        }
        if (Math.abs(matrix[pivot][col]) < 1e-12) {
            throw new RangeError("Polynomial fit is singular");
        }
        [matrix[col], matrix[pivot]] = [matrix[pivot], matrix[col]];

        for (let row = 0; row < size; row++) {
            if (row === col) continue;
            const factor = matrix[row][col] / matrix[col][col];
            for (let k = col; k <= size; k++) {
                matrix[row][k] -= factor * matrix[col][k];
            }
        }
    }

    return matrix.map((line, i) => line[size] / line[i]);
}

export function evaluatePolynomial(coefficients: readonly number[], x: number): number {
    return coefficients.reduce((sum, coefficient, power) => sum + coefficient * x ** power, 0);
}

/**
 * Trend-only projection: fits a degree-2 polynomial of amount against the
 * number of months since the first observation and extends it
 * `FORECAST_HORIZON` months past the last one. No seasonality and no error bounds.
 */
export function forecastSeries(series: readonly MonthPoint[]): ForecastPoint[] {
    if (series.length === 0) return [];

    const history = [...series].sort((a, b) => a.month.localeCompare(b.month));
    const origin = history[0].month;
    const xs = history.map((point) => monthsBetween(origin, point.month));
    const coefficients = fitPolynomial(
        xs,
        history.map((point) => point.total),
        FORECAST_DEGREE,
    );

    const lastX = xs[xs.length - 1];
    const predictions: ForecastPoint[] = [];
    for (let step = 1; step <= FORECAST_HORIZON; step++) {
        const x = lastX + step;
        predictions.push({
            month: shiftMonthKey(origin, x),
            amount: evaluatePolynomial(coefficients, x),
            predicted: true,
        });
    }

    return [
        ...history.map((point) => ({ month: point.month, amount: point.total, predicted: false })),
        ...predictions,
    ];
}

/** Numeric kernels for the analysis procedures. Pure functions, no I/O. */

export const Z_95 = 1.959963984540054;

// ─── Descriptives ───────────────────────────────────────────────────────────

export function sum(xs: readonly number[]): number {
    let s = 0;
    for (const x of xs) s += x;
    return s;
}

export function mean(xs: readonly number[]): number {
    return xs.length ? sum(xs) / xs.length : NaN;
}

/** Sample variance (n − 1 denominator). */
export function variance(xs: readonly number[]): number {
    const n = xs.length;
    if (n < 2) return NaN;
    const m = mean(xs);
    let ss = 0;
    for (const x of xs) ss += (x - m) * (x - m);
    return ss / (n - 1);
}

export function stdDev(xs: readonly number[]): number {
    return Math.sqrt(variance(xs));
}

// no spread here: Math.min(...xs) throws RangeError past ~125k values
export function minimum(xs: readonly number[]): number {
    let m = Infinity;
    for (const x of xs) if (x < m) m = x;
    return xs.length ? m : NaN;
}

export function maximum(xs: readonly number[]): number {
    let m = -Infinity;
    for (const x of xs) if (x > m) m = x;
    return xs.length ? m : NaN;
}

export function median(xs: readonly number[]): number {
    if (!xs.length) return NaN;
    const s = [...xs].sort((a, b) => a - b);
    const mid = Math.floor(s.length / 2);
    return s.length % 2 ? s[mid] : (s[mid - 1] + s[mid]) / 2;
}

// ─── Special functions ──────────────────────────────────────────────────────

const LANCZOS = [
    0.99999999999980993, 676.5203681218851, -1259.1392167224028, 771.32342877765313,
    -176.61502916214059, 12.507343278686905, -0.13857109526572012, 9.9843695780195716e-6,
    1.5056327351493116e-7,
];

/** ln Γ(x), Lanczos approximation (g = 7). */
export function logGamma(x: number): number {
    if (x < 0.5) return Math.log(Math.PI / Math.sin(Math.PI * x)) - logGamma(1 - x);
    const z = x - 1;
    let a = LANCZOS[0];
    const t = z + 7.5;
    for (let i = 1; i < LANCZOS.length; i++) a += LANCZOS[i] / (z + i);
    return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(a);
}

function logFac(n: number): number {
    return n < 2 ? 0 : logGamma(n + 1);
}

const EPS = 3e-14;
const FPMIN = 1e-300;
const MAX_ITER = 500;

function betaContinuedFraction(a: number, b: number, x: number): number {
    const qab = a + b;
    const qap = a + 1;
    const qam = a - 1;
    let c = 1;
    let d = 1 - (qab * x) / qap;
    if (Math.abs(d) < FPMIN) d = FPMIN;
    d = 1 / d;
    let h = d;
    for (let m = 1; m <= MAX_ITER; m++) {
        const m2 = 2 * m;
        let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
        d = 1 + aa * d;
        if (Math.abs(d) < FPMIN) d = FPMIN;
        c = 1 + aa / c;
        if (Math.abs(c) < FPMIN) c = FPMIN;
        d = 1 / d;
        h *= d * c;
        aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
        d = 1 + aa * d;
        if (Math.abs(d) < FPMIN) d = FPMIN;
        c = 1 + aa / c;
        if (Math.abs(c) < FPMIN) c = FPMIN;
        d = 1 / d;
        const del = d * c;
        h *= del;
        if (Math.abs(del - 1) < EPS) break;
    }
    return h;
}

/** Regularized incomplete beta I_x(a, b). */
export function incompleteBeta(x: number, a: number, b: number): number {
    if (x <= 0) return 0;
    if (x >= 1) return 1;
    const bt = Math.exp(
        logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x),
    );
    if (x < (a + 1) / (a + b + 2)) return (bt * betaContinuedFraction(a, b, x)) / a;
    return 1 - (bt * betaContinuedFraction(b, a, 1 - x)) / b;
}

/** Regularized upper incomplete gamma Q(a, x). */
export function upperIncompleteGamma(a: number, x: number): number {
    if (x <= 0) return 1;
    const lnPrefix = -x + a * Math.log(x) - logGamma(a);
    if (x < a + 1) {
        // series for P(a, x)
        let ap = a;
        let del = 1 / a;
        let total = del;
        for (let n = 0; n < MAX_ITER; n++) {
            ap += 1;
            del *= x / ap;
            total += del;
            if (Math.abs(del) < Math.abs(total) * EPS) break;
        }
        return 1 - total * Math.exp(lnPrefix);
    }
    // continued fraction for Q(a, x)
    let b = x + 1 - a;
    let c = 1 / FPMIN;
    let d = 1 / b;
    let h = d;
    for (let i = 1; i <= MAX_ITER; i++) {
        const an = -i * (i - a);
        b += 2;
        d = an * d + b;
        if (Math.abs(d) < FPMIN) d = FPMIN;
        c = b + an / c;
        if (Math.abs(c) < FPMIN) c = FPMIN;
        d = 1 / d;
        const del = d * c;
        h *= del;
        if (Math.abs(del - 1) < EPS) break;
    }
    return Math.exp(lnPrefix) * h;
}

/** Two-sided p-value of a Student t statistic. */
export function studentTTwoSidedP(t: number, df: number): number {
    if (!Number.isFinite(t)) return 0;
    return incompleteBeta(df / (df + t * t), df / 2, 0.5);
}

export function chiSquaredSurvival(x: number, df: number): number {
    return upperIncompleteGamma(df / 2, x / 2);
}

// ─── Tests ──────────────────────────────────────────────────────────────────

export interface TestResult {
    statistic: number | null;
    pValue: number | null;
}

/**
 * Two-sided Fisher's exact test for a 2×2 table.
 *
 *           | Col1 | Col2 |
 *     Row1  |  a   |  b   |
 *     Row2  |  c   |  d   |
 */
export function fishersExact2x2(a: number, b: number, c: number, d: number): number {
    const N = a + b + c + d;
    if (N === 0) return 1;

    const R1 = a + b;
    const R2 = c + d;
    const C1 = a + c;
    const C2 = b + d;

    const logHyper = (x: number): number =>
        logFac(R1) + logFac(R2) + logFac(C1) + logFac(C2)
        - logFac(N) - logFac(x) - logFac(R1 - x) - logFac(C1 - x) - logFac(N - R1 - C1 + x);

    const logPobs = logHyper(a);
    const aMin = Math.max(0, C1 - R2);
    const aMax = Math.min(R1, C1);

    let pValue = 0;
    for (let x = aMin; x <= aMax; x++) {
        const logPx = logHyper(x);
        // tables as extreme or more extreme than the observed one
        if (logPx <= logPobs + 1e-7) pValue += Math.exp(logPx);
    }
    return Math.min(pValue, 1.0);
}

/**
 * Pearson chi-squared test of independence on a 2×2 table, df = 1.
 * Applies the Yates continuity correction (never past the expected count).
 * Null statistic when a margin is empty.
 */
export function chiSquared2x2(a: number, b: number, c: number, d: number, yates = true): TestResult {
    const observed = [a, b, c, d];
    const rows = [a + b, c + d];
    const cols = [a + c, b + d];
    const N = a + b + c + d;
    if (rows.includes(0) || cols.includes(0)) return { statistic: null, pValue: null };

    let chi2 = 0;
    for (let i = 0; i < 4; i++) {
        const expected = (rows[Math.floor(i / 2)] * cols[i % 2]) / N;
        let o = observed[i];
        if (yates) {
            const diff = expected - o;
            o += Math.sign(diff) * Math.min(0.5, Math.abs(diff));
        }
        chi2 += ((o - expected) * (o - expected)) / expected;
    }
    return { statistic: chi2, pValue: chiSquaredSurvival(chi2, 1) };
}

export interface PairedTTest extends TestResult {
    n: number;
    meanDifference: number;
    sdDifference: number;
    /** every difference identical, so the statistic is undefined */
    noVariance: boolean;
}

/** Paired two-sided t-test on (after − before). */
export function pairedTTest(before: readonly number[], after: readonly number[]): PairedTTest {
    const diffs = after.map((v, i) => v - before[i]);
    const n = diffs.length;
    const md = mean(diffs);
    const sd = n > 1 ? stdDev(diffs) : NaN;
    if (n < 2) return { statistic: null, pValue: null, n, meanDifference: md, sdDifference: sd, noVariance: false };
    if (sd === 0) {
        return md === 0
            ? { statistic: 0, pValue: 1, n, meanDifference: 0, sdDifference: 0, noVariance: true }
            : { statistic: null, pValue: null, n, meanDifference: md, sdDifference: 0, noVariance: true };
    }
    const t = md / (sd / Math.sqrt(n));
    return { statistic: t, pValue: studentTTwoSidedP(t, n - 1), n, meanDifference: md, sdDifference: sd, noVariance: false };
}

/** Student two-sample t-test with pooled variance. */
export function twoSampleTTest(a: readonly number[], b: readonly number[]): TestResult {
    const na = a.length;
    const nb = b.length;
    if (na < 2 || nb < 2) return { statistic: null, pValue: null };
    const df = na + nb - 2;
    const pooled = ((na - 1) * variance(a) + (nb - 1) * variance(b)) / df;
    const se = Math.sqrt(pooled * (1 / na + 1 / nb));
    const diff = mean(a) - mean(b);
    if (se === 0) return diff === 0 ? { statistic: 0, pValue: 1 } : { statistic: null, pValue: null };
    const t = diff / se;
    return { statistic: t, pValue: studentTTwoSidedP(t, df) };
}

// ─── Correlation ────────────────────────────────────────────────────────────

export interface Correlation {
    r: number | null;
    pValue: number | null;
}

export function pearson(xs: readonly number[], ys: readonly number[]): Correlation {
    const n = xs.length;
    if (n < 2 || ys.length !== n) return { r: null, pValue: null };
    const mx = mean(xs);
    const my = mean(ys);
    let sxy = 0;
    let sxx = 0;
    let syy = 0;
    for (let i = 0; i < n; i++) {
        const dx = xs[i] - mx;
        const dy = ys[i] - my;
        sxy += dx * dy;
        sxx += dx * dx;
        syy += dy * dy;
    }
    if (sxx === 0 || syy === 0) return { r: null, pValue: null };
    const r = Math.max(-1, Math.min(1, sxy / Math.sqrt(sxx * syy)));
    if (n < 3) return { r, pValue: null };
    if (Math.abs(r) === 1) return { r, pValue: 0 };
    const t = r * Math.sqrt((n - 2) / (1 - r * r));
    return { r, pValue: studentTTwoSidedP(t, n - 2) };
}

/** 1-based ranks, ties share their average rank. */
export function averageRanks(xs: readonly number[]): number[] {
    const order = xs.map((v, i) => ({ v, i })).sort((p, q) => p.v - q.v);
    const ranks = new Array<number>(xs.length);
    let k = 0;
    while (k < order.length) {
        let j = k;
        while (j + 1 < order.length && order[j + 1].v === order[k].v) j++;
        const avg = (k + j) / 2 + 1;
        for (let m = k; m <= j; m++) ranks[order[m].i] = avg;
        k = j + 1;
    }
    return ranks;
}

export function spearman(xs: readonly number[], ys: readonly number[]): Correlation {
    return pearson(averageRanks(xs), averageRanks(ys));
}

// ─── Kaplan–Meier ───────────────────────────────────────────────────────────

export interface SurvivalObservation {
    /** follow-up time (days) */
    time: number;
    /** true = event observed, false = censored */
    event: boolean;
}

export interface KaplanMeierStep {
    time: number;
    atRisk: number;
    events: number;
    survival: number;
    /** Greenwood's Σ d / (n (n − d)) up to this step */
    greenwood: number;
}

export interface SurvivalPoint {
    survival: number;
    ciLower: number;
    ciUpper: number;
}

/** Product-limit estimate; one step per distinct event time. */
export function kaplanMeier(observations: readonly SurvivalObservation[]): KaplanMeierStep[] {
    const sorted = [...observations].sort((p, q) => p.time - q.time);
    const steps: KaplanMeierStep[] = [];
    let survival = 1;
    let greenwood = 0;
    let i = 0;
    while (i < sorted.length) {
        const t = sorted[i].time;
        const atRisk = sorted.length - i;
        let events = 0;
        let j = i;
        while (j < sorted.length && sorted[j].time === t) {
            if (sorted[j].event) events++;
            j++;
        }
        if (events > 0) {
            survival *= 1 - events / atRisk;
            greenwood += atRisk > events ? events / (atRisk * (atRisk - events)) : Infinity;
            steps.push({ time: t, atRisk, events, survival, greenwood });
        }
        i = j;
    }
    return steps;
}

/** S(t) with a log(−log) Greenwood 95% interval. */
export function survivalAt(steps: readonly KaplanMeierStep[], t: number): SurvivalPoint {
    let last: KaplanMeierStep | undefined;
    for (const s of steps) {
        if (s.time > t) break;
        last = s;
    }
    if (!last) return { survival: 1, ciLower: 1, ciUpper: 1 };
    const S = last.survival;
    if (S <= 0 || S >= 1 || !Number.isFinite(last.greenwood)) return { survival: S, ciLower: S, ciUpper: S };
    const logS = Math.log(S);
    const se = Math.sqrt(last.greenwood / (logS * logS));
    return {
        survival: S,
        ciLower: Math.pow(S, Math.exp(Z_95 * se)),
        ciUpper: Math.pow(S, Math.exp(-Z_95 * se)),
    };
}

/** First time S(t) ≤ 0.5, or null when the curve never gets there. */
export function medianSurvival(steps: readonly KaplanMeierStep[]): number | null {
    const hit = steps.find((s) => s.survival <= 0.5);
    return hit ? hit.time : null;
}

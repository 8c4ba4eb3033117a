//
// The fixed set of quantities we smooth and publish, along with how each
// one is shown. Keys are the short codes used on the wire and on the
// command line (--display-data BSP TWA HDG)
//
export const metricKeys = ['BSP', 'HDG', 'HDM', 'COG', 'SOG', 'AWA', 'AWS', 'TWA', 'TWS', 'DPT', 'TMP'] as const;

export type MetricKey = (typeof metricKeys)[number];

// Angles wrap, either compass style 0-360 or signed (-180, 180] with port negative
export type AngleRange = 'circle' | 'signed';

export interface MetricDisplay {
    label: string;
    unit: string; // must not contain ':'
    decimals: number;
    wrap?: AngleRange;
}

export const metrics = {
    BSP: {label: 'Boat Speed', unit: 'kn', decimals: 1},
    HDG: {label: 'Heading', unit: '°T', decimals: 0, wrap: 'circle'},
    HDM: {label: 'Heading Mag', unit: '°M', decimals: 0, wrap: 'circle'},
    COG: {label: 'Course Over Ground', unit: '°T', decimals: 0, wrap: 'circle'},
    SOG: {label: 'Speed Over Ground', unit: 'kn', decimals: 1},
    AWA: {label: 'Apparent Wind Angle', unit: '°', decimals: 0, wrap: 'signed'},
    AWS: {label: 'Apparent Wind Speed', unit: 'kn', decimals: 1},
    TWA: {label: 'True Wind Angle', unit: '°', decimals: 0, wrap: 'signed'},
    TWS: {label: 'True Wind Speed', unit: 'kn', decimals: 1},
    DPT: {label: 'Depth', unit: 'm', decimals: 1},
    TMP: {label: 'Water Temp', unit: '°C', decimals: 1}
} satisfies Record<MetricKey, MetricDisplay>;

export function isMetricKey(key: string): key is MetricKey {
    return Object.hasOwn(metrics, key);
}

export function angleRange(key: MetricKey): AngleRange | undefined {
    const display: MetricDisplay = metrics[key];
    return display.wrap;
}

export function normaliseAngle(angle: number, range: AngleRange): number {
    let circle = angle % 360;
    if (circle < 0) {
        circle += 360;
    }
    // a tiny negative remainder rounds up to a full turn
    if (circle >= 360) {
        circle -= 360;
    }
    return range == 'signed' && circle > 180 ? circle - 360 : circle;
}

export function formatValue(key: MetricKey, value: number): string {
    const display = metrics[key];
    const fixed = value.toFixed(display.decimals);
    // -0.3 rounds to "-0", which is just 0
    return (Number(fixed) === 0 ? (0).toFixed(display.decimals) : fixed) + display.unit;
}

// One update as sent to subscribers, eg: BSP:6.2kn
export function formatUnit(key: MetricKey, value: number): string {
    return `${key}:${formatValue(key, value)}`;
}

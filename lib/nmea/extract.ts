import {DecodedSentence} from './sentence';
import {MetricKey, normaliseAngle} from '../metrics';
import {Seconds} from '../types';

// A single raw value for a metric, consumed immediately by the smoothing store
export interface RawObservation {
    key: MetricKey;
    value: number;
    observedAt: Seconds;
}

const knotsPerKmh = 1 / 1.852;
const knotsPerMs = 3600 / 1852;
const metresPerFoot = 0.3048;
const metresPerFathom = 1.8288;

function toKnots(speed: number | undefined, unit: 'K' | 'M' | 'N'): number | undefined {
    if (speed === undefined) {
        return undefined;
    }
    switch (unit) {
        case 'K':
            return speed * knotsPerKmh;
        case 'M':
            return speed * knotsPerMs;
        case 'N':
            return speed;
    }
}

// Prefer the first unit the instrument actually filled in
function firstDefined(...values: (number | undefined)[]): number | undefined {
    return values.find((v) => v !== undefined);
}

//
// Map a decoded sentence to the metrics it carries. A sentence we understand
// but have nothing to show for (GLL, or RMC without a fix) gives an empty list
export function extractObservations(sentence: DecodedSentence, observedAt: Seconds): RawObservation[] {
    const found: [MetricKey, number | undefined][] = [];

    switch (sentence.kind) {
        case 'VHW':
            found.push(['HDG', sentence.headingTrue], ['HDM', sentence.headingMagnetic], ['BSP', firstDefined(sentence.speedKnots, toKnots(sentence.speedKmh, 'K'))]);
            break;

        case 'MWV':
            if (sentence.valid) {
                const speed = toKnots(sentence.speed, sentence.speedUnit);
                if (sentence.reference == 'R') {
                    found.push(['AWA', normaliseAngle(sentence.angle, 'signed')], ['AWS', speed]);
                } else {
                    found.push(['TWA', normaliseAngle(sentence.angle, 'signed')], ['TWS', speed]);
                }
            }
            break;

        case 'VWR':
            found.push(['AWA', sentence.side == 'L' ? -sentence.angle : sentence.angle], ['AWS', firstDefined(sentence.speedKnots, toKnots(sentence.speedMs, 'M'), toKnots(sentence.speedKmh, 'K'))]);
            break;

        case 'VTG':
            found.push(['COG', sentence.courseTrue], ['SOG', firstDefined(sentence.speedKnots, toKnots(sentence.speedKmh, 'K'))]);
            break;

        case 'RMC':
            if (sentence.valid) {
                found.push(['SOG', sentence.speedKnots], ['COG', sentence.courseTrue]);
            }
            break;

        case 'HDT':
            found.push(['HDG', sentence.heading]);
            break;

        case 'HDG':
            found.push(['HDM', sentence.heading + (sentence.deviation ?? 0)]);
            break;

        case 'DPT':
            found.push(['DPT', sentence.depth]);
            break;

        case 'DBT':
            found.push([
                'DPT',
                firstDefined(
                    sentence.depthMetres,
                    sentence.depthFeet === undefined ? undefined : sentence.depthFeet * metresPerFoot,
                    sentence.depthFathoms === undefined ? undefined : sentence.depthFathoms * metresPerFathom
                )
            ]);
            break;

        case 'MTW':
            found.push(['TMP', sentence.temperature]);
            break;

        case 'GLL':
            break;

        default: {
            const unhandled: never = sentence;
            return unhandled;
        }
    }

    const observations: RawObservation[] = [];
    for (const [key, value] of found) {
        if (value !== undefined && Number.isFinite(value)) {
            observations.push({key, value, observedAt});
        }
    }
    return observations;
}

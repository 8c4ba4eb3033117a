import {test} from 'node:test';
import {strict as assert} from 'node:assert';

import {decodeSentence} from '../lib/nmea/sentence';
import {extractObservations} from '../lib/nmea/extract';
import {Seconds} from '../lib/types';

const t = 1000 as Seconds;

// Decode then extract, returning key => value
function extract(input: string): Record<string, number> {
    const result = decodeSentence(input);
    if (!result.ok) {
        throw new Error(`${input} did not decode: ${result.message}`);
    }
    const found: Record<string, number> = {};
    for (const o of extractObservations(result.sentence, t)) {
        assert.equal(o.observedAt, t);
        assert.equal(found[o.key], undefined, `${o.key} extracted twice`);
        found[o.key] = o.value;
    }
    return found;
}

test('VHW gives heading true, heading magnetic and boat speed', () => {
    assert.deepEqual(extract('$IIVHW,245.1,T,243.8,M,6.2,N,11.5,K*6B'), {HDG: 245.1, HDM: 243.8, BSP: 6.2});
});

test('VHW with only km/h converts to knots', () => {
    const found = extract('$IIVHW,,T,,M,,N,18.52,K');
    assert.deepEqual(Object.keys(found), ['BSP']);
    assert.ok(Math.abs(found.BSP - 10) < 1e-9);
});

test('MWV relative wind becomes signed apparent wind', () => {
    assert.deepEqual(extract('$IIMWV,315.0,R,12.4,N,A*0D'), {AWA: -45, AWS: 12.4});
});

test('MWV true wind in m/s is converted to knots', () => {
    const found = extract('$IIMWV,45.0,T,10.0,M,A*38');
    assert.deepEqual(Object.keys(found), ['TWA', 'TWS']);
    assert.equal(found.TWA, 45);
    assert.ok(Math.abs(found.TWS - 19.4384449) < 1e-6);
});

test('MWV flagged invalid yields nothing', () => {
    assert.deepEqual(extract('$IIMWV,45.0,T,10.0,N,V'), {});
});

test('VWR on the left is a negative apparent angle', () => {
    assert.deepEqual(extract('$IIVWR,45.0,L,8.5,N,4.4,M,15.7,K*58'), {AWA: -45, AWS: 8.5});
});

test('VTG gives course and speed over ground', () => {
    assert.deepEqual(extract('$IIVTG,054.7,T,034.4,M,005.5,N,010.2,K*5F'), {COG: 54.7, SOG: 5.5});
});

test('RMC gives speed and course only with a fix', () => {
    assert.deepEqual(extract('$GPRMC,123519,A,4807.038,N,01131.000,E,022.4,084.4,230394,003.1,W*6A'), {SOG: 22.4, COG: 84.4});
    assert.deepEqual(extract('$GPRMC,123519,V,,,,,,,230394,,*33'), {});
});

test('HDT, HDG, DPT, MTW map to a single key', () => {
    assert.deepEqual(extract('$IIHDT,274.07,T*14'), {HDG: 274.07});
    assert.deepEqual(extract('$IIHDG,98.3,0.0,E,12.6,W*5C'), {HDM: 98.3});
    assert.deepEqual(extract('$IIHDG,98.0,2.0,W,,'), {HDM: 96});
    assert.deepEqual(extract('$IIDPT,12.4,0.5*72'), {DPT: 12.4});
    assert.deepEqual(extract('$IIMTW,17.9,C*1C'), {TMP: 17.9});
});

test('DBT prefers metres, then feet', () => {
    assert.deepEqual(extract('$IIDBT,036.41,f,011.10,M,005.99,F*25'), {DPT: 11.1});
    const found = extract('$IIDBT,10.0,f,,M,,F');
    assert.ok(Math.abs(found.DPT - 3.048) < 1e-9);
});

test('GLL is understood but has nothing to extract', () => {
    assert.deepEqual(extract('$GPGLL,4916.45,N,12311.12,W,225444,A*31'), {});
});

test('empty fields are skipped rather than reported as zero', () => {
    assert.deepEqual(extract('$IIVTG,,T,,M,6.1,N,,K'), {SOG: 6.1});
});

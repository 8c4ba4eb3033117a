import {test} from 'node:test';
import {strict as assert} from 'node:assert';

import {decodeSentence} from '../lib/nmea/sentence';

test('decodes VHW with all fields', () => {
    const result = decodeSentence('$IIVHW,245.1,T,243.8,M,6.2,N,11.5,K*6B');
    assert.deepEqual(result, {
        ok: true,
        sentence: {kind: 'VHW', talker: 'II', headingTrue: 245.1, headingMagnetic: 243.8, speedKnots: 6.2, speedKmh: 11.5}
    });
});

test('accepts a Buffer with trailing CRLF', () => {
    const result = decodeSentence(Buffer.from('$IIHDT,274.07,T*14\r\n'));
    assert.deepEqual(result, {ok: true, sentence: {kind: 'HDT', talker: 'II', heading: 274.07}});
});

test('checksum is optional and case insensitive', () => {
    assert.deepEqual(decodeSentence('$IIMTW,17.9,C'), {ok: true, sentence: {kind: 'MTW', talker: 'II', temperature: 17.9}});
    assert.equal(decodeSentence('$IIMTW,17.9,C*1c').ok, true);
});

test('decodes MWV relative wind', () => {
    const result = decodeSentence('$IIMWV,315.0,R,12.4,N,A*0D');
    assert.deepEqual(result, {
        ok: true,
        sentence: {kind: 'MWV', talker: 'II', angle: 315, reference: 'R', speed: 12.4, speedUnit: 'N', valid: true}
    });
});

test('decodes VWR, DPT and HDG', () => {
    assert.deepEqual(decodeSentence('$IIVWR,45.0,L,8.5,N,4.4,M,15.7,K*58'), {
        ok: true,
        sentence: {kind: 'VWR', talker: 'II', angle: 45, side: 'L', speedKnots: 8.5, speedMs: 4.4, speedKmh: 15.7}
    });
    assert.deepEqual(decodeSentence('$IIDPT,12.4,0.5*72'), {ok: true, sentence: {kind: 'DPT', talker: 'II', depth: 12.4}});
    assert.deepEqual(decodeSentence('$IIHDG,98.0,2.0,W,,'), {ok: true, sentence: {kind: 'HDG', talker: 'II', heading: 98, deviation: -2}});
});

test('decodes RMC motion', () => {
    const result = decodeSentence('$GPRMC,123519,A,4807.038,N,01131.000,E,022.4,084.4,230394,003.1,W*6A');
    assert.deepEqual(result, {ok: true, sentence: {kind: 'RMC', talker: 'GP', valid: true, speedKnots: 22.4, courseTrue: 84.4}});
});

test('RMC without a fix has empty fields rather than zeros', () => {
    const result = decodeSentence('$GPRMC,123519,V,,,,,,,230394,,*33');
    assert.deepEqual(result, {ok: true, sentence: {kind: 'RMC', talker: 'GP', valid: false, speedKnots: undefined, courseTrue: undefined}});
});

test('GLL decodes with nothing but the talker', () => {
    assert.deepEqual(decodeSentence('$GPGLL,4916.45,N,12311.12,W,225444,A*31'), {ok: true, sentence: {kind: 'GLL', talker: 'GP'}});
});

test('checksum mismatch is a failure', () => {
    const result = decodeSentence('$IIHDT,274.07,T*15');
    assert.deepEqual(result, {ok: false, reason: 'checksum', message: 'checksum 15 should be 14', input: '$IIHDT,274.07,T*15'});
});

test('unsupported sentence type is a failure', () => {
    assert.deepEqual(decodeSentence('$IIXDR,C,19.5,C,AIR*07'), {ok: false, reason: 'unsupported', message: 'unsupported sentence type XDR', input: '$IIXDR,C,19.5,C,AIR*07'});
    // nmea-simple knows GGA but we have nothing to show for it
    const gga = decodeSentence('$GPGGA,123519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,');
    assert.equal(!gga.ok && gga.reason, 'unsupported');
});

test('garbage and truncated input are malformed', () => {
    for (const input of ['', 'hello world', '$IIHD', '$IIHDT', '\x00\x01\x02', '$IIHDT,274.07,T*ZZ']) {
        const result = decodeSentence(input);
        assert.equal(result.ok, false, input);
        assert.equal(!result.ok && result.reason, 'malformed', input);
    }
});

test('non numeric field is malformed', () => {
    const result = decodeSentence('$IIVHW,,T,,M,abc,N,,K*35');
    assert.deepEqual(result, {ok: false, reason: 'malformed', message: "VHW: field 5 is not a number: 'abc'", input: '$IIVHW,,T,,M,abc,N,,K*35'});
});

test('missing required field is malformed', () => {
    const result = decodeSentence('$IIMWV,,R,12.4,N,A*24');
    assert.deepEqual(result, {ok: false, reason: 'malformed', message: 'MWV: field 1 is required', input: '$IIMWV,,R,12.4,N,A*24'});
});

test('VWR without a side is malformed', () => {
    const result = decodeSentence('$IIVWR,45.0,,8.5,N');
    assert.deepEqual(result, {ok: false, reason: 'malformed', message: 'VWR: field 2 should be one of L/R', input: '$IIVWR,45.0,,8.5,N'});
});

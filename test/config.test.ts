import {test} from 'node:test';
import {strict as assert} from 'node:assert';

import {ConfigurationError, loadConfig} from '../lib/config';

test('defaults', () => {
    assert.deepEqual(loadConfig([]), {
        udpPort: 2002,
        webPort: 8000,
        logLevel: 'error',
        displayKeys: ['BSP', 'TWA', 'HDG'],
        tau: 2,
        sendTimeoutMs: 2000,
        maxPendingBytes: 65536
    });
});

test('command line options', () => {
    const config = loadConfig(['--udp-port', '10110', '--web-port', '8080', '--log-level', 'WARNING', '--display-data', 'BSP', 'AWS,TWS', 'BSP', '--tau', '0', '--send-timeout', '500', '--max-pending', '4096']);
    assert.deepEqual(config, {
        udpPort: 10110,
        webPort: 8080,
        logLevel: 'warning',
        displayKeys: ['BSP', 'AWS', 'TWS'],
        tau: 0,
        sendTimeoutMs: 500,
        maxPendingBytes: 4096
    });
});

test('unknown display keys refuse to start and are all named', () => {
    assert.throws(
        () => loadConfig(['--display-data', 'BSP', 'XYZ', 'bsp']),
        (e: unknown) => {
            if (!(e instanceof ConfigurationError)) {
                return false;
            }
            assert.deepEqual(e.problems, ['unknown display key(s) XYZ, bsp, valid keys are BSP HDG HDM COG SOG AWA AWS TWA TWS DPT TMP']);
            return true;
        }
    );
});

test('every problem is reported together', () => {
    assert.throws(
        () => loadConfig(['--tau=-1', '--udp-port', '0', '--log-level', 'loud']),
        (e: unknown) => {
            if (!(e instanceof ConfigurationError)) {
                return false;
            }
            assert.deepEqual(e.problems, ['unknown log level loud', 'invalid udp port 0', 'smoothing time constant must be >= 0, not -1']);
            return true;
        }
    );
});

test('unknown flags are a configuration error', () => {
    assert.throws(() => loadConfig(['--bogus']), ConfigurationError);
});

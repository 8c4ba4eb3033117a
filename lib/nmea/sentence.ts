//
// Decode a single NMEA 0183 sentence (one UDP datagram) into a typed
// record. nmea-simple splits the fields, checks the checksum and has the
// codecs for most of what instruments send, DPT, MTW and VWR are added
// through its custom packet hook. Anything we can't make sense of comes
// back as a DecodeFailure, this never throws so a bad datagram can't take
// the listener down
//
import {DefaultPacketFactory, Packet, parseGenericPacket} from 'nmea-simple';
import {initStubFields, PacketStub} from 'nmea-simple/dist/codecs/PacketStub';
import {computeNmeaChecksum, parseFloatSafe, toHexString} from 'nmea-simple/dist/helpers';

import {Celsius, Degrees, Knots, Metres, TalkerId} from '../types';

// Depth below transducer
export interface DPTPacket extends PacketStub<'DPT'> {
    depthMeters: number;
}

export interface MTWPacket extends PacketStub<'MTW'> {
    temperature: number;
}

// Relative wind, 0-180 off the bow on the given side
export interface VWRPacket extends PacketStub<'VWR'> {
    windAngle: number;
    side: '' | 'L' | 'R';
    speedKnots: number;
    speedMs: number;
    speedKmph: number;
}

type InstrumentPacket = DPTPacket | MTWPacket | VWRPacket;

class InstrumentPacketFactory extends DefaultPacketFactory<InstrumentPacket> {
    constructor() {
        // Checksums are optional on the wire, decodeSentence rejects the wrong ones
        super(true);
    }

    assembleCustomPacket(stub: PacketStub, fields: string[]): InstrumentPacket | null {
        switch (stub.sentenceId) {
            case 'DPT':
                return {...initStubFields<'DPT'>(stub, 'DPT'), depthMeters: parseFloatSafe(fields[1])};
            case 'MTW':
                return {...initStubFields<'MTW'>(stub, 'MTW'), temperature: parseFloatSafe(fields[1])};
            case 'VWR':
                return {
                    ...initStubFields<'VWR'>(stub, 'VWR'),
                    windAngle: parseFloatSafe(fields[1]),
                    side: fields[2] === 'L' ? 'L' : fields[2] === 'R' ? 'R' : '',
                    speedKnots: parseFloatSafe(fields[3]),
                    speedMs: parseFloatSafe(fields[5]),
                    speedKmph: parseFloatSafe(fields[7])
                };
            default:
                return null;
        }
    }
}

const packetFactory = new InstrumentPacketFactory();

interface SentenceBase<Kind extends string> {
    kind: Kind;
    talker: TalkerId;
}

// Water speed and heading
export interface VhwSentence extends SentenceBase<'VHW'> {
    headingTrue?: Degrees;
    headingMagnetic?: Degrees;
    speedKnots?: Knots;
    speedKmh?: number;
}

// Wind speed and angle, relative (apparent) or theoretical (true)
export interface MwvSentence extends SentenceBase<'MWV'> {
    angle: Degrees; // 0-359 clockwise from the bow
    reference: 'R' | 'T';
    speed?: number;
    speedUnit: 'K' | 'M' | 'N';
    valid: boolean;
}

export interface VwrSentence extends SentenceBase<'VWR'> {
    angle: Degrees;
    side: 'L' | 'R';
    speedKnots?: Knots;
    speedMs?: number;
    speedKmh?: number;
}

// Track made good and ground speed
export interface VtgSentence extends SentenceBase<'VTG'> {
    courseTrue?: Degrees;
    speedKnots?: Knots;
    speedKmh?: number;
}

// Recommended minimum navigation information, we only want the motion
export interface RmcSentence extends SentenceBase<'RMC'> {
    valid: boolean;
    speedKnots?: Knots;
    courseTrue?: Degrees;
}

export interface HdtSentence extends SentenceBase<'HDT'> {
    heading: Degrees;
}

// Heading from a magnetic sensor, deviation is east positive
export interface HdgSentence extends SentenceBase<'HDG'> {
    heading: Degrees;
    deviation?: Degrees;
}

export interface DptSentence extends SentenceBase<'DPT'> {
    depth: Metres;
}

export interface DbtSentence extends SentenceBase<'DBT'> {
    depthFeet?: number;
    depthMetres?: Metres;
    depthFathoms?: number;
}

export interface MtwSentence extends SentenceBase<'MTW'> {
    temperature: Celsius;
}

// Position only, which we don't display
export type GllSentence = SentenceBase<'GLL'>;

export type DecodedSentence = VhwSentence | MwvSentence | VwrSentence | VtgSentence | RmcSentence | HdtSentence | HdgSentence | DptSentence | DbtSentence | MtwSentence | GllSentence;

export type SentenceKind = DecodedSentence['kind'];

export const sentenceKinds: readonly SentenceKind[] = ['VHW', 'MWV', 'VWR', 'VTG', 'RMC', 'HDT', 'HDG', 'DPT', 'DBT', 'MTW', 'GLL'];

export type DecodeFailureReason = 'malformed' | 'checksum' | 'unsupported';

export interface DecodeFailure {
    ok: false;
    reason: DecodeFailureReason;
    message: string;
    input: string;
}

export type DecodeResult = {ok: true; sentence: DecodedSentence} | DecodeFailure;

// Thrown while mapping fields, always caught before leaving this module
class MalformedSentence extends Error {}

//
// nmea-simple reads an empty field as 0 and garbage as NaN, the raw text
// of the field tells "no reading" apart from a real zero. Indexes are the
// NMEA field numbers, the address field is 0
class FieldText {
    constructor(private readonly fields: readonly string[]) {}

    optional(index: number, value: number): number | undefined {
        const field = this.fields[index] ?? '';
        if (field === '') {
            return undefined;
        }
        if (!Number.isFinite(value)) {
            throw new MalformedSentence(`field ${index} is not a number: '${field}'`);
        }
        return value;
    }

    required(index: number, value: number): number {
        const reading = this.optional(index, value);
        if (reading === undefined) {
            throw new MalformedSentence(`field ${index} is required`);
        }
        return reading;
    }

    // A magnitude followed by an E/W field, west is negative
    eastWest(index: number, value: number, direction: '' | 'E' | 'W'): number | undefined {
        const reading = this.optional(index, value);
        return reading !== undefined && direction === 'W' ? -reading : reading;
    }
}

function toSentence(packet: Packet | InstrumentPacket, f: FieldText): DecodedSentence | undefined {
    const talker = (packet.talkerId ?? '') as TalkerId;

    switch (packet.sentenceId) {
        case 'VHW':
            return {
                kind: 'VHW',
                talker,
                headingTrue: f.optional(1, packet.degreesTrue) as Degrees | undefined,
                headingMagnetic: f.optional(3, packet.degreesMagnetic) as Degrees | undefined,
                speedKnots: f.optional(5, packet.speedKnots) as Knots | undefined,
                speedKmh: f.optional(7, packet.speedKmph)
            };
        case 'MWV':
            return {
                kind: 'MWV',
                talker,
                angle: f.required(1, packet.windAngle) as Degrees,
                reference: packet.reference == 'relative' ? 'R' : 'T',
                speed: f.optional(3, packet.speed),
                speedUnit: packet.units,
                valid: packet.status == 'valid'
            };
        case 'VWR': {
            const angle = f.required(1, packet.windAngle) as Degrees;
            if (packet.side === '') {
                throw new MalformedSentence('field 2 should be one of L/R');
            }
            return {
                kind: 'VWR',
                talker,
                angle,
                side: packet.side,
                speedKnots: f.optional(3, packet.speedKnots) as Knots | undefined,
                speedMs: f.optional(5, packet.speedMs),
                speedKmh: f.optional(7, packet.speedKmph)
            };
        }
        case 'VTG':
            return {
                kind: 'VTG',
                talker,
                courseTrue: f.optional(1, packet.trackTrue) as Degrees | undefined,
                speedKnots: f.optional(5, packet.speedKnots) as Knots | undefined,
                speedKmh: f.optional(7, packet.speedKmph ?? NaN)
            };
        case 'RMC':
            return {
                kind: 'RMC',
                talker,
                valid: packet.status == 'valid',
                speedKnots: f.optional(7, packet.speedKnots) as Knots | undefined,
                courseTrue: f.optional(8, packet.trackTrue) as Degrees | undefined
            };
        case 'HDT':
            return {kind: 'HDT', talker, heading: f.required(1, packet.heading) as Degrees};
        case 'HDG':
            return {
                kind: 'HDG',
                talker,
                heading: f.required(1, packet.heading) as Degrees,
                deviation: f.eastWest(2, packet.deviation, packet.deviationDirection) as Degrees | undefined
            };
        case 'DPT':
            return {kind: 'DPT', talker, depth: f.required(1, packet.depthMeters) as Metres};
        case 'DBT':
            return {
                kind: 'DBT',
                talker,
                depthFeet: f.optional(1, packet.depthFeet),
                depthMetres: f.optional(3, packet.depthMeters) as Metres | undefined,
                depthFathoms: f.optional(5, packet.depthFathoms)
            };
        case 'MTW':
            return {kind: 'MTW', talker, temperature: f.required(1, packet.temperature) as Celsius};
        case 'GLL':
            return {kind: 'GLL', talker};
        default:
            return undefined;
    }
}

function isSentenceKind(type: string): type is SentenceKind {
    return sentenceKinds.some((kind) => kind === type);
}

// $ or !, two character talker, three character type, fields, optional checksum
const sentencePattern = /^[$!]([A-Z0-9]{2})([A-Z]{3}),([^*]*)(?:\*([0-9A-Fa-f]{2}))?$/;

export function decodeSentence(payload: Buffer | string): DecodeResult {
    const input = (typeof payload == 'string' ? payload : payload.toString('utf8')).trim();

    const match = sentencePattern.exec(input);
    if (!match) {
        return {ok: false, reason: 'malformed', message: 'not an NMEA sentence', input};
    }
    const [, , type, , checksum] = match;

    if (!isSentenceKind(type)) {
        return {ok: false, reason: 'unsupported', message: `unsupported sentence type ${type}`, input};
    }

    try {
        const packet = parseGenericPacket(input, packetFactory);
        if (checksum !== undefined && !packet.chxOk) {
            const expected = toHexString(computeNmeaChecksum(input.split('*')[0]));
            return {ok: false, reason: 'checksum', message: `checksum ${checksum.toUpperCase()} should be ${expected}`, input};
        }

        const sentence = toSentence(packet, new FieldText(input.split('*')[0].split(',')));
        if (!sentence) {
            return {ok: false, reason: 'unsupported', message: `unsupported sentence type ${type}`, input};
        }
        return {ok: true, sentence};
    } catch (e) {
        if (e instanceof Error) {
            return {ok: false, reason: 'malformed', message: `${type}: ${e.message}`, input};
        }
        throw e;
    }
}

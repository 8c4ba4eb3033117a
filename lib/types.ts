// Ensure that types are 'protected' to help enforce correct
// assignments
// https://softwareengineering.stackexchange.com/a/437630
export declare abstract class As<Tag extends keyof never> {
    private static readonly $as$: unique symbol;
    private [As.$as$]: Record<Tag, true>;
}

export type Seconds = number & As<'Seconds'>;

export type Knots = number & As<'Knots'>;
export type Degrees = number & As<'Degrees'>; /// signed or 0-360 depending on the field
export type Metres = number & As<'Metres'>;
export type Celsius = number & As<'Celsius'>;

export type TalkerId = string & As<'TalkerId'>;

// Helper for the current time, can be overridden for testing
export const defaultNow = (): Seconds => (Date.now() / 1000) as Seconds;

/**
 * Coordinate Codec
 *
 * Converts decimal-degree coordinates to and from the sexagesimal
 * (degrees / minutes / seconds) form that EXIF GPS tags store as rationals.
 *
 * Seconds are kept as a rational over a fixed denominator of 10000 and are
 * truncated, so an encoded angle never exceeds the input magnitude. The
 * worst-case loss is 1 / (10000 * 3600) degrees.
 */

export type LatitudeHemisphere = 'N' | 'S';
export type LongitudeHemisphere = 'E' | 'W';
export type Hemisphere = LatitudeHemisphere | LongitudeHemisphere;

/** Ordered pair: [positive member, negative member] */
export type HemispherePair = readonly [Hemisphere, Hemisphere];

export const LATITUDE_HEMISPHERES = ['N', 'S'] as const satisfies HemispherePair;
export const LONGITUDE_HEMISPHERES = ['E', 'W'] as const satisfies HemispherePair;

export const SECONDS_DENOMINATOR = 10000;

/**
 * Round-trip tolerance in decimal degrees
 */
export const COORDINATE_TOLERANCE = 1e-4;

export interface Rational {
  numerator: number;
  denominator: number;
}

export interface SexagesimalAngle {
  degrees: number;
  minutes: number;
  seconds: Rational;
  hemisphere: Hemisphere;
}

export interface GeoCoordinate {
  latitude: number;
  longitude: number;
}

/**
 * Encode a decimal angle as degrees, minutes and rational seconds
 *
 * Negative input takes the second member of `hemispheres`; zero (including
 * -0) takes the first.
 */
export function toSexagesimal(decimalDegrees: number, hemispheres: HemispherePair): SexagesimalAngle {
  if (!Number.isFinite(decimalDegrees)) {
    throw new RangeError(`Cannot encode non-finite angle: ${decimalDegrees}`);
  }

  const hemisphere = decimalDegrees < 0 ? hemispheres[1] : hemispheres[0];
  const absolute = Math.abs(decimalDegrees);

  const degrees = Math.trunc(absolute);
  const minutesFloat = (absolute - degrees) * 60;
  const minutes = Math.trunc(minutesFloat);
  const secondsFloat = (minutesFloat - minutes) * 60;

  return {
    degrees,
    minutes,
    seconds: {
      numerator: Math.trunc(secondsFloat * SECONDS_DENOMINATOR),
      denominator: SECONDS_DENOMINATOR
    },
    hemisphere
  };
}

/**
 * Decode a sexagesimal angle back to signed decimal degrees
 */
export function toDecimal(angle: SexagesimalAngle): number {
  const magnitude =
    angle.degrees + angle.minutes / 60 + rationalValue(angle.seconds) / 3600;
  return applyHemisphere(magnitude, angle.hemisphere);
}

/**
 * Sign a magnitude from a GPS reference.
 *
 * Accepts the single-letter EXIF form and the spelled-out form
 * ("South", "West"). Without a reference the value keeps its own sign.
 */
export function applyHemisphere(magnitude: number, reference: string | undefined): number {
  const ref = reference?.trim().charAt(0).toUpperCase();
  if (ref === 'S' || ref === 'W') {
    return -Math.abs(magnitude);
  }
  if (ref === 'N' || ref === 'E') {
    return Math.abs(magnitude);
  }
  return magnitude;
}

export function rationalValue(value: Rational): number {
  if (value.denominator === 0) {
    throw new RangeError('Rational denominator must not be zero');
  }
  return value.numerator / value.denominator;
}

export function isValidCoordinate(coordinate: GeoCoordinate): boolean {
  return (
    Number.isFinite(coordinate.latitude) &&
    Number.isFinite(coordinate.longitude) &&
    Math.abs(coordinate.latitude) <= 90 &&
    Math.abs(coordinate.longitude) <= 180
  );
}

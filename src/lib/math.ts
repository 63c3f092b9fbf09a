/**
 * Shared navigational math for the simulation.
 * Positions are geographic (decimal degrees), distances are nautical miles,
 * speeds are knots and bearings are true degrees (0 = North, 90 = East).
 */

import type { DistanceModel, Position } from '../store/types';

// ============================================================================
// CONSTANTS
// ============================================================================

/** One minute of latitude is one nautical mile */
export const NM_PER_DEGREE_LAT = 60;

/** Mean Earth radius in nautical miles */
export const EARTH_RADIUS_NM = 3440.065;

export const METERS_PER_NM = 1852;

/** WGS-84 ellipsoid */
const WGS84_A = 6378137;
const WGS84_F = 1 / 298.257223563;
const WGS84_B = (1 - WGS84_F) * WGS84_A;

const VINCENTY_MAX_ITERATIONS = 200;
const VINCENTY_TOLERANCE = 1e-12;

/** Floor for cos(latitude) so longitude scaling stays finite near the poles */
const MIN_COS_LAT = 1e-6;

// ============================================================================
// ANGLE UTILITIES
// ============================================================================

/**
 * Normalizes an angle to 0-359 degrees
 * @param angle - Angle in degrees (can be negative or > 360)
 * @returns Normalized angle in range [0, 360)
 */
export const normalizeAngle = (angle: number): number => {
  return (angle % 360 + 360) % 360;
};

/**
 * Wraps a longitude into [-180, 180)
 */
export const normalizeLongitude = (lon: number): number => {
  return ((lon + 180) % 360 + 360) % 360 - 180;
};

export const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

export const toDegrees = (radians: number): number => (radians * 180) / Math.PI;

const cosLatitude = (lat: number): number => Math.max(Math.cos(toRadians(lat)), MIN_COS_LAT);

// ============================================================================
// DISTANCE
// ============================================================================

/**
 * Equirectangular distance. East-west separation is scaled by cos(mean latitude).
 */
export const planarDistanceNm = (from: Position, to: Position): number => {
  const north = (to.lat - from.lat) * NM_PER_DEGREE_LAT;
  const east =
    normalizeLongitude(to.lon - from.lon) *
    NM_PER_DEGREE_LAT *
    cosLatitude((from.lat + to.lat) / 2);
  return Math.sqrt(north * north + east * east);
};

/**
 * Great-circle distance (haversine on a spherical Earth)
 */
export const haversineDistanceNm = (from: Position, to: Position): number => {
  const phi1 = toRadians(from.lat);
  const phi2 = toRadians(to.lat);
  const dPhi = phi2 - phi1;
  const dLambda = toRadians(normalizeLongitude(to.lon - from.lon));

  const a =
    Math.sin(dPhi / 2) ** 2 +
    Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2;
  return 2 * EARTH_RADIUS_NM * Math.asin(Math.min(1, Math.sqrt(a)));
};

export interface GeodesicSolution {
  distanceNm: number;
  initialBearing: number;   // degrees true at `from`
  finalBearing: number;     // degrees true on arrival at `to`
}

/**
 * Vincenty's inverse formula on the WGS-84 ellipsoid.
 * Returns null when the iteration does not converge (nearly antipodal points).
 */
export const vincentyInverse = (from: Position, to: Position): GeodesicSolution | null => {
  const f = WGS84_F;
  const L = toRadians(normalizeLongitude(to.lon - from.lon));
  const U1 = Math.atan((1 - f) * Math.tan(toRadians(from.lat)));
  const U2 = Math.atan((1 - f) * Math.tan(toRadians(to.lat)));
  const sinU1 = Math.sin(U1);
  const cosU1 = Math.cos(U1);
  const sinU2 = Math.sin(U2);
  const cosU2 = Math.cos(U2);

  let lambda = L;
  for (let i = 0; i < VINCENTY_MAX_ITERATIONS; i++) {
    const sinLambda = Math.sin(lambda);
    const cosLambda = Math.cos(lambda);
    const sinSigma = Math.sqrt(
      (cosU2 * sinLambda) ** 2 + (cosU1 * sinU2 - sinU1 * cosU2 * cosLambda) ** 2
    );
    const cosSigma = sinU1 * sinU2 + cosU1 * cosU2 * cosLambda;
    if (sinSigma === 0) {
      // Coincident points; exactly antipodal ones have no unique geodesic
      return cosSigma > 0 ? { distanceNm: 0, initialBearing: 0, finalBearing: 0 } : null;
    }

    const sigma = Math.atan2(sinSigma, cosSigma);
    const sinAlpha = (cosU1 * cosU2 * sinLambda) / sinSigma;
    const cosSqAlpha = 1 - sinAlpha * sinAlpha;
    // cosSqAlpha is 0 on an equatorial line
    const cos2SigmaM = cosSqAlpha !== 0 ? cosSigma - (2 * sinU1 * sinU2) / cosSqAlpha : 0;
    const C = (f / 16) * cosSqAlpha * (4 + f * (4 - 3 * cosSqAlpha));

    const previous = lambda;
    lambda =
      L +
      (1 - C) * f * sinAlpha *
        (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM ** 2)));
    if (Math.abs(lambda - previous) > VINCENTY_TOLERANCE) continue;

    const uSq = (cosSqAlpha * (WGS84_A ** 2 - WGS84_B ** 2)) / WGS84_B ** 2;
    const A = 1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)));
    const B = (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)));
    const deltaSigma =
      B * sinSigma *
      (cos2SigmaM +
        (B / 4) *
          (cosSigma * (-1 + 2 * cos2SigmaM ** 2) -
            (B / 6) * cos2SigmaM * (-3 + 4 * sinSigma ** 2) * (-3 + 4 * cos2SigmaM ** 2)));
    const meters = WGS84_B * A * (sigma - deltaSigma);

    const initialRad = Math.atan2(cosU2 * sinLambda, cosU1 * sinU2 - sinU1 * cosU2 * cosLambda);
    const finalRad = Math.atan2(cosU1 * sinLambda, -sinU1 * cosU2 + cosU1 * sinU2 * cosLambda);
    return {
      distanceNm: meters / METERS_PER_NM,
      initialBearing: normalizeAngle(toDegrees(initialRad)),
      finalBearing: normalizeAngle(toDegrees(finalRad))
    };
  }

  return null;
};

/**
 * Ellipsoidal distance. Falls back to the great-circle distance where
 * Vincenty's iteration does not converge.
 */
export const vincentyDistanceNm = (from: Position, to: Position): number =>
  vincentyInverse(from, to)?.distanceNm ?? haversineDistanceNm(from, to);

export const distanceNm = (from: Position, to: Position, model: DistanceModel = 'PLANAR'): number => {
  switch (model) {
    case 'GREAT_CIRCLE':
      return haversineDistanceNm(from, to);
    case 'VINCENTY':
      return vincentyDistanceNm(from, to);
    case 'PLANAR':
      return planarDistanceNm(from, to);
  }
};

// ============================================================================
// BEARING & DEAD RECKONING
// ============================================================================

/**
 * Bearing from one position to another on the local planar approximation
 * @returns Bearing in degrees (0 = North, 90 = East)
 */
export const calculateBearing = (from: Position, to: Position): number => {
  const north = to.lat - from.lat;
  const east = normalizeLongitude(to.lon - from.lon) * cosLatitude((from.lat + to.lat) / 2);
  if (north === 0 && east === 0) return 0;
  return normalizeAngle(toDegrees(Math.atan2(east, north)));
};

/**
 * Moves a position along a bearing. The longitude delta is divided by
 * cos(latitude) to undo the convergence of meridians.
 */
export const offsetPosition = (origin: Position, bearing: number, distance: number): Position => {
  const rad = toRadians(bearing);
  const north = distance * Math.cos(rad);
  const east = distance * Math.sin(rad);

  const lat = Math.max(-90, Math.min(90, origin.lat + north / NM_PER_DEGREE_LAT));
  const lon = normalizeLongitude(origin.lon + east / (NM_PER_DEGREE_LAT * cosLatitude(origin.lat)));
  return { lat, lon };
};

/** Fixed-point iterations allowed when placing a point along a track */
const TRACK_MAX_ITERATIONS = 32;

/**
 * Moves `distance` NM from `from` toward `to` along the straight track
 * between them in latitude/longitude. The point is placed so that
 * planarDistanceNm(result, to) is exactly the remaining distance, so a
 * constant-speed transit covers the planar distance in step-sized pieces.
 */
export const advanceAlongTrack = (from: Position, to: Position, distance: number): Position => {
  const total = planarDistanceNm(from, to);
  if (distance >= total) return { ...to };
  if (distance <= 0) return { ...from };

  const dLat = to.lat - from.lat;
  const dLon = normalizeLongitude(to.lon - from.lon);
  const left = total - distance;

  // Planar length of the whole track when measured from the point a
  // fraction `share` short of `to` (east-west scale follows the mean latitude)
  const spanAt = (share: number): number => {
    const north = dLat * NM_PER_DEGREE_LAT;
    const east = dLon * NM_PER_DEGREE_LAT * cosLatitude(to.lat - (share * dLat) / 2);
    return Math.sqrt(north * north + east * east);
  };

  let share = left / total;
  for (let i = 0; i < TRACK_MAX_ITERATIONS; i++) {
    const next = left / spanAt(share);
    const settled = Math.abs(next - share) < 1e-15;
    share = next;
    if (settled) break;
  }

  return {
    lat: to.lat - share * dLat,
    lon: normalizeLongitude(to.lon - share * dLon)
  };
};

// ============================================================================
// CONVERSION UTILITIES
// ============================================================================

/**
 * Distance covered at a speed over a span of game time
 * @param knots - Speed in knots
 * @param seconds - Elapsed game seconds
 * @returns Distance in nautical miles
 */
export const knotsToNauticalMiles = (knots: number, seconds: number): number => {
  return (knots * seconds) / 3600;
};

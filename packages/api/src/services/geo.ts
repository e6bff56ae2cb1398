/** Mean Earth radius in miles, as used by the search query. */
export const EARTH_RADIUS_MILES = 3959;

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

/** Great-circle distance in miles (spherical law of cosines form of haversine). */
export function distanceMiles(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const cosine =
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.cos(toRadians(lon2) - toRadians(lon1)) +
    Math.sin(toRadians(lat1)) * Math.sin(toRadians(lat2));
  // acos is undefined just outside [-1, 1] from float error at identical points
  return EARTH_RADIUS_MILES * Math.acos(Math.min(1, Math.max(-1, cosine)));
}

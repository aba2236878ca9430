import type { AuroraSnapshot, CacheStats, IpLocation, KpReading, ResolvedLocation } from '@aurora-mcp/core';

function coordinateLine(location: ResolvedLocation): string {
  const { latitude, longitude } = location.coordinate;
  return `Location: ${latitude.toFixed(2)}°, ${longitude.toFixed(2)}°`;
}

function formatProbability(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * Viewing advice for an aurora probability (0..100).
 */
export function viewingRecommendation(probability: number): string {
  if (probability > 50) return 'HIGH - Excellent aurora viewing conditions!';
  if (probability > 25) return 'MODERATE - Aurora may be visible with clear skies';
  return 'LOW - Aurora unlikely to be visible';
}

export function formatAuroraForecast(location: ResolvedLocation, snapshot: AuroraSnapshot): string {
  const lines = [
    `Aurora Forecast for ${location.displayName}`,
    coordinateLine(location),
    '',
    `Current Aurora Probability: ${formatProbability(snapshot.probability)}`,
    `Current Kp Index: ${snapshot.kpIndex}`,
    '',
    'Viewing Recommendation:',
    viewingRecommendation(snapshot.probability),
  ];

  const { latitude } = location.coordinate;
  if (latitude > 0 && latitude < 55) {
    lines.push('', 'Note: Your latitude is quite far south. Aurora is typically visible above 60°N.');
  }
  if (location.note) {
    lines.push('', `Note: ${location.note}`);
  }

  return lines.join('\n');
}

export function formatAuroraPrediction(
  location: ResolvedLocation,
  solarWind: readonly unknown[],
  hoursAhead: number,
): string {
  const lines = [
    `Aurora Prediction for ${location.displayName}`,
    coordinateLine(location),
    '',
    `Forecast Period: Next ${hoursAhead} hours`,
    '',
    'Based on ENLIL solar wind model and solar activity forecasts:',
    `- Solar wind data points available: ${solarWind.length}`,
    '- Solar flare probabilities loaded',
    '',
    'Note: Full prediction analysis requires parsing ENLIL time series data.',
    'This would predict CME arrivals and geomagnetic storm timing.',
  ];

  if (location.note) {
    lines.push('', `Note: ${location.note}`);
  }

  return lines.join('\n');
}

export function formatKpIndex(latest: KpReading): string {
  return [
    'Current Geomagnetic Activity (Kp Index)',
    '',
    `Kp: ${latest.kp}`,
    `Time: ${latest.time_tag}`,
    '',
    'Scale:',
    '0-2: Quiet',
    '3-4: Unsettled',
    '5: Minor storm (G1)',
    '6: Moderate storm (G2)',
    '7: Strong storm (G3)',
    '8: Severe storm (G4)',
    '9: Extreme storm (G5)',
    '',
    'Higher Kp values mean better aurora visibility at lower latitudes.',
  ].join('\n');
}

export function formatIpLocation(location: IpLocation): string {
  const { latitude, longitude } = location.coordinate;
  return [
    'Detected Location from IP Address:',
    '',
    `City: ${location.city}`,
    `Region: ${location.region}`,
    `Country: ${location.country}`,
    `Coordinates: ${latitude.toFixed(2)}°, ${longitude.toFixed(2)}°`,
    '',
    'Note: IP geolocation is approximate (city-level accuracy).',
    'If this is incorrect, use get_aurora_forecast with exact coordinates.',
  ].join('\n');
}

export function formatCacheStats(stats: CacheStats): string {
  const lines = [
    'Cache Statistics:',
    '',
    `Size: ${stats.size}/${stats.capacity} entries`,
    `Hit Rate: ${stats.hitRate}`,
    `Hits: ${stats.hits}`,
    `Misses: ${stats.misses}`,
    '',
    'Cached Keys:',
  ];
  for (const key of stats.keys) lines.push(`  - ${key}`);
  return lines.join('\n');
}

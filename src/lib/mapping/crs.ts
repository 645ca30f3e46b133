/**
 * Extracts the horizontal part of a compound WKT coordinate system.
 * proj4 does not accept COMPD_CS definitions, only their PROJCS or GEOGCS member.
 *
 * @param wkt - WKT definition, possibly compound
 * @returns The horizontal definition, or the input when it is not compound
 */
export function extractHorizontalCrs(wkt: string): string {
  const trimmed = wkt.trim();
  if (!trimmed.startsWith('COMPD_CS[')) return trimmed;

  let start = trimmed.indexOf('PROJCS[');
  if (start === -1) start = trimmed.indexOf('GEOGCS[');
  if (start === -1) return trimmed;

  // Find matching bracket
  let depth = 0;
  for (let i = start; i < trimmed.length; i++) {
    if (trimmed[i] === '[') depth++;
    if (trimmed[i] === ']') {
      depth--;
      if (depth === 0) {
        return trimmed.substring(start, i + 1);
      }
    }
  }
  return trimmed;
}

/**
 * Detects the vertical unit of a WKT definition.
 *
 * @param wkt - WKT definition
 * @returns The factor converting the unit to metres (1.0 when metres or unknown)
 */
export function getVerticalUnitFactor(wkt: string): number {
  const FEET_TO_METERS = 0.3048;
  const US_SURVEY_FEET_TO_METERS = 0.3048006096012192;

  const lower = wkt.toLowerCase();
  if (lower.includes('us survey foot') || lower.includes('us_survey_foot') || lower.includes('foot_us')) {
    return US_SURVEY_FEET_TO_METERS;
  }
  if (/unit\s*\[\s*"(international )?foot/i.test(wkt) || /"ft"/i.test(wkt)) {
    return FEET_TO_METERS;
  }
  return 1.0;
}

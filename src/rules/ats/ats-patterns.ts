/**
 * Regex patterns shared by section detection and signal extraction.
 * Global patterns are only used through String.prototype.match / matchAll.
 */
export const PATTERNS = {
  EMAIL: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/,

  // 555-123-4567, (555) 123 4567, +1 555.123.4567
  PHONE: /(?:\+?\d{1,3}[\s.-]?)?(?:\(\d{3}\)|\d{3})[\s.-]?\d{3}[\s.-]?\d{4}\b/,

  LINKEDIN: /linkedin/i,

  LOCATION_WORD: /\b(?:location|address|city|country)\b/i,
  // Austin, TX (not "React, CI/CD")
  CITY_STATE: /\b[A-Z][a-z]+,\s*[A-Z]{2}(?=\s|$)/,

  YEAR: /\b(?:19|20)\d{2}\b/g,

  // 2019 - 2021, 2020 – Present, 2018 to Mar 2020
  DATE_RANGE:
    /\b((?:19|20)\d{2})\s*(?:-|–|—|to)\s*(?:[A-Za-z]{3,9}\.?\s+)?((?:19|20)\d{2}|present|current|now)\b/gi,

  PERCENTAGE: /\d+(?:\.\d+)?\s*%/g,
  CURRENCY: /[$€£₹]\s?\d[\d,]*(?:\.\d+)?\s*[kmb]?/gi,
  MULTIPLIER: /\b\d+(?:\.\d+)?x\b/gi,
  COUNT:
    /\b\d[\d,]*\+?\s*(?:users?|customers?|clients?|members?|people|downloads?|requests?|transactions?|students?|employees?|projects?|teams?|hours?)\b/gi,

  BULLET: /^[•\-*→·]/,

  FIRST_PERSON: /\b(?:I|[Mm]e|[Mm]y|[Mm]yself)\b/g,
} as const

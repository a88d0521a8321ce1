/**
 * Challenge page detection.
 *
 * Interstitials (captcha walls, "checking your browser" pages) are often
 * served with a 200, so status codes alone are not enough.
 */

import * as cheerio from 'cheerio'

export interface ChallengeSignal {
  detected: boolean
  markers: string[]
}

const SELECTOR_MARKERS: ReadonlyArray<[selector: string, marker: string]> = [
  ['[data-sitekey]', 'sitekey'],
  ['.cf-turnstile', 'turnstile'],
  ['#challenge-form', 'challenge-form'],
  ['#challenge-running', 'challenge-running'],
  ['iframe[src*="captcha"]', 'captcha-iframe'],
  ['iframe[src*="challenges.cloudflare.com"]', 'challenge-iframe'],
]

const TITLE_PATTERNS = [/just a moment/i, /attention required/i, /security check/i]

const TEXT_PATTERNS = [
  /additional verification required/i,
  /verify you are (a )?human/i,
  /complete the security check/i,
]

export function detectChallenge(html: string): ChallengeSignal {
  if (!html.trim()) return { detected: false, markers: [] }

  const $ = cheerio.load(html)
  const markers: string[] = []

  for (const [selector, marker] of SELECTOR_MARKERS) {
    if ($(selector).length > 0) markers.push(marker)
  }

  const title = $('title').first().text().trim()
  if (TITLE_PATTERNS.some((pattern) => pattern.test(title))) {
    markers.push('interstitial-title')
  }

  const text = $('body').text().replace(/\s+/g, ' ')
  if (TEXT_PATTERNS.some((pattern) => pattern.test(text))) {
    markers.push('verification-text')
  }

  return { detected: markers.length > 0, markers }
}

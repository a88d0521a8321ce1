import { describe, expect, it } from 'vitest'
import { detectChallenge } from '../challenge-detector.js'

describe('detectChallenge', () => {
  it('ignores empty bodies', () => {
    expect(detectChallenge('  ')).toEqual({ detected: false, markers: [] })
  })

  it('does not flag an ordinary posting page', () => {
    const html = '<html><head><title>Platform Engineer</title></head><body><h1>Platform Engineer</h1><p>Remote</p></body></html>'
    expect(detectChallenge(html)).toEqual({ detected: false, markers: [] })
  })

  it('reports widget markers before the interstitial title', () => {
    const html = `
      <html>
        <head><title>Just a moment...</title></head>
        <body><div class="cf-turnstile" data-sitekey="test-site-key"></div></body>
      </html>`

    expect(detectChallenge(html)).toEqual({
      detected: true,
      markers: ['sitekey', 'turnstile', 'interstitial-title'],
    })
  })

  it('recognizes verification prompts in body text', () => {
    const html = '<html><body><p>Please verify   you are a human to continue.</p></body></html>'
    expect(detectChallenge(html).markers).toEqual(['verification-text'])
  })

  it('recognizes captcha iframes', () => {
    const html = '<html><body><iframe src="https://widgets.example.com/captcha/v2"></iframe></body></html>'
    expect(detectChallenge(html).markers).toEqual(['captcha-iframe'])
  })
})

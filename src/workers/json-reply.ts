/**
 * Parse a model reply that was asked to be JSON only. Models still
 * wrap it in a ``` fence now and then, so one is stripped first.
 * Returns undefined when the text is not JSON.
 */
export function parseJsonReply(raw: string): unknown {
  let text = raw.trim()
  if (text.startsWith('```')) {
    text = text.replace(/^```[a-zA-Z]*\n?/, '').replace(/```\s*$/, '').trim()
  }
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

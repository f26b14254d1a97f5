import * as cheerio from "cheerio"
import { XMLValidator } from "fast-xml-parser"

export class XmlParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "XmlParseError"
  }
}

/**
 * cheerio's XML mode accepts anything, so well-formedness is checked first
 * with the fast-xml-parser validator.
 */
export const loadXmlDocument = (xml: string): cheerio.CheerioAPI => {
  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    const { code, msg, line, col } = validation.err
    throw new XmlParseError(`${code} at ${line}:${col}: ${msg}`)
  }
  const $ = cheerio.load(xml, { xml: true })
  if ($.root().children().length === 0) {
    throw new XmlParseError("Document has no root element")
  }
  return $
}

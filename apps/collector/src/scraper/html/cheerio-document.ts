/**
 * Cheerio-backed implementation of the document capability.
 */

import * as cheerio from 'cheerio'
import type { Cheerio } from 'cheerio'
import type { AnyNode } from 'domhandler'
import type { ScrapeDocument, ScrapeNode } from '../types.js'

class CheerioNode<T extends AnyNode> implements ScrapeNode {
  constructor(private readonly selection: Cheerio<T>) {}

  select(selector: string): ScrapeNode[] {
    const matches = this.selection.find(selector)
    const nodes: ScrapeNode[] = []
    for (let i = 0; i < matches.length; i++) {
      nodes.push(new CheerioNode(matches.eq(i)))
    }
    return nodes
  }

  selectFirst(selector: string): ScrapeNode | null {
    const match = this.selection.find(selector).first()
    return match.length > 0 ? new CheerioNode(match) : null
  }

  text(): string {
    return this.selection.text()
  }

  attr(name: string): string | null {
    const value = this.selection.attr(name)
    return value === undefined ? null : value
  }
}

/**
 * Parse an HTML payload into a document.
 */
export function loadDocument(html: string): ScrapeDocument {
  const $ = cheerio.load(html)
  return new CheerioNode($.root())
}

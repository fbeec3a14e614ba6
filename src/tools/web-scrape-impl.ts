// Web Scrape Implementation - page fetching with HTML parsing for the web_scrape dev tool

import type { ReadableStreamDefaultReader, ReadableStreamReadResult } from 'node:stream/web';
import * as cheerio from 'cheerio';
import { errorMessage } from '../core/errors.js';

const SCRAPE_TIMEOUT = 10_000; // 10 seconds
const MAX_CONTENT_SIZE = 1024 * 1024; // 1MB
const MAX_ELEMENTS = 5;
const ELEMENT_TEXT_LIMIT = 100;
const PAGE_TEXT_LIMIT = 500;

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Fetch a page and summarize it: the matches of `selector` when given,
 * otherwise the title and the start of the body text.
 */
export async function executeWebScrape(url: string, selector?: string): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), SCRAPE_TIMEOUT);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        'User-Agent': 'Loopwise/1.0 (web scraper)',
        'Accept': 'text/html, text/plain',
      },
    });

    // The timeout covers the body as well as the headers
    const html = await readBodyWithLimit(response, MAX_CONTENT_SIZE, controller.signal);
    const $ = cheerio.load(html);
    $('script, style, noscript').remove();

    if (selector) {
      const elements = $(selector);
      const texts = elements
        .slice(0, MAX_ELEMENTS)
        .map((_, el) => collapseWhitespace($(el).text()).slice(0, ELEMENT_TEXT_LIMIT))
        .get();
      return `Found ${elements.length} elements:\n${texts.join('\n')}`;
    }

    const title = collapseWhitespace($('title').first().text()) || 'No title';
    const body = $('body');
    const text = collapseWhitespace(body.length > 0 ? body.text() : $.root().text());

    return `Page title: ${title}\nText content (first ${PAGE_TEXT_LIMIT} chars): ${text.slice(0, PAGE_TEXT_LIMIT)}`;
  } catch (err) {
    return `Scraping error: ${errorMessage(err)}`;
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Read at most `maxBytes` of the body; the rest is discarded. Rejects when
 * `signal` aborts before the body is complete.
 */
async function readBodyWithLimit(response: Response, maxBytes: number, signal: AbortSignal): Promise<string> {
  const reader = response.body?.getReader();
  if (!reader) {
    return '';
  }

  const chunks: Uint8Array[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await readUntilAborted(reader, signal);
      if (done) break;

      totalBytes += value.byteLength;
      if (totalBytes >= maxBytes) {
        chunks.push(value.slice(0, value.byteLength - (totalBytes - maxBytes)));
        await reader.cancel();
        break;
      }
      chunks.push(value);
    }
  } catch (err) {
    await reader.cancel();
    throw err;
  }

  const decoder = new TextDecoder('utf-8', { fatal: false });
  return chunks.map((chunk) => decoder.decode(chunk, { stream: true })).join('') + decoder.decode();
}

function readUntilAborted(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  signal: AbortSignal
): Promise<ReadableStreamReadResult<Uint8Array>> {
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(new Error(`Request timed out after ${SCRAPE_TIMEOUT / 1000}s`));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    reader.read().then(
      (result) => {
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

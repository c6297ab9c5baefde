/**
 * Paginated collection reader
 *
 * Follows a WaniKani collection from its first URL through each page's
 * `pages.next_url`, handing out one record at a time. The sequence is lazy
 * (a page is requested only when the previous one is drained) and single-pass:
 * once finished or abandoned it stays finished, and reading the collection
 * again means building a new fetcher.
 *
 * @example
 * ```ts
 * for await (const id of client.paginate(url, AssignmentRecordSchema)) {
 *   ids.add(id);
 * }
 * ```
 */

import type { z } from "zod";
import type { PageEnvelope } from "./wanikani-schema";

export interface PageSource {
  getPage(url: string, signal?: AbortSignal): Promise<PageEnvelope>;
}

export type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export class PagedFetcher<T> implements AsyncIterableIterator<T> {
  private nextUrl: string | null;
  private records: T[] = [];
  private position = 0;
  private inFlight: AbortController | null = null;
  private finished = false;
  private pages = 0;

  constructor(
    private readonly source: PageSource,
    startUrl: string,
    private readonly schema: RecordSchema<T>,
  ) {
    this.nextUrl = startUrl;
  }

  /** Pages received so far. */
  get pagesFetched(): number {
    return this.pages;
  }

  get done(): boolean {
    return this.finished;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    while (this.position >= this.records.length) {
      if (this.finished || this.nextUrl === null) {
        this.finish();
        return { done: true, value: undefined };
      }
      await this.loadPage(this.nextUrl);
    }
    const value = this.records[this.position];
    this.position += 1;
    return { done: false, value };
  }

  // Called by `for await` on break/throw; cancels a request still in flight.
  async return(): Promise<IteratorResult<T, undefined>> {
    this.inFlight?.abort();
    this.finish();
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  private async loadPage(url: string): Promise<void> {
    const controller = new AbortController();
    this.inFlight = controller;
    try {
      const page = await this.source.getPage(url, controller.signal);
      this.records = page.data.map((raw, index) => this.parseRecord(raw, url, index));
      this.position = 0;
      this.nextUrl = page.pages.next_url ?? null;
      this.pages += 1;
    } catch (err) {
      this.finish();
      throw err;
    } finally {
      if (this.inFlight === controller) this.inFlight = null;
    }
  }

  private parseRecord(raw: unknown, url: string, index: number): T {
    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Unexpected record #${index} from ${url}: ${issue?.path.join(".") || "(root)"} ${issue?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  private finish(): void {
    this.finished = true;
    this.records = [];
    this.position = 0;
    this.nextUrl = null;
  }
}

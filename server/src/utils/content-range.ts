import { BadRequestError } from "./errors";

export interface ContentRange {
  start: number;
  end: number;
  total: number;
}

export const DEFAULT_CONTENT_RANGE_PATTERN = /^bytes (\d+)-(\d+)\/(\d+)$/;

/**
 * Parses a `bytes <start>-<end>/<total>` header. The range is inclusive and
 * must lie inside the declared total.
 */
export function parseContentRange(
  header: string | undefined,
  pattern: RegExp = DEFAULT_CONTENT_RANGE_PATTERN,
): ContentRange {
  if (header === undefined) {
    throw new BadRequestError("Missing Content-Range header");
  }

  const match = pattern.exec(header);
  if (!match) {
    throw new BadRequestError(`Wrong Content-Range header "${header}"`);
  }

  const [start, end, total] = match.slice(1, 4).map((g) => Number(g));
  if (
    !Number.isSafeInteger(start) ||
    !Number.isSafeInteger(end) ||
    !Number.isSafeInteger(total) ||
    end < start ||
    end >= total
  ) {
    throw new BadRequestError(`Wrong Content-Range header "${header}"`);
  }

  return { start, end, total };
}

import { isContentLine } from "../../shared/utils/lines";

export function parseSummary(body: ReadonlyArray<string>): string {
  return body
    .filter(isContentLine)
    .map((line) => line.trim())
    .join(" ");
}

import { isContentLine, stripBullet } from "../../shared/utils/lines";

export function parseCertifications(body: ReadonlyArray<string>): string[] {
  return body.filter(isContentLine).map(stripBullet);
}

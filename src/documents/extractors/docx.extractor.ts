import mammoth from "mammoth";

export async function extractDocxText(buffer: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer });
  // mammoth separates paragraphs with a blank line; keep one line per paragraph.
  return result.value.replace(/\n\n/g, "\n").trimEnd();
}

import path from "path";
import { writeText } from "../utils/file";

/** Where rendered subtitle documents go */
export interface ContentSink {
  /** Returns the absolute location of the saved document */
  save(content: string, destination: string, contentType: string): Promise<string>;
}

export class FileContentSink implements ContentSink {
  readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  async save(content: string, destination: string, contentType: string): Promise<string> {
    const target = path.resolve(this.outputDir, destination);
    await writeText(target, content);
    console.log("[Content Saved]", {
      target,
      contentType,
      bytes: Buffer.byteLength(content, "utf8"),
    });
    return target;
  }
}

import { Injectable } from "@nestjs/common";
import fs from "fs/promises";
import path from "path";

export interface OutputSink {
  write(chunk: string): unknown;
}

/** Writes an assembled document to stdout, or to a file when asked to. */
@Injectable()
export class DocumentWriterService {
  private sink: OutputSink = process.stdout;

  useSink(sink: OutputSink): void {
    this.sink = sink;
  }

  async write(text: string, outputPath?: string): Promise<void> {
    const body = text.endsWith("\n") ? text : `${text}\n`;
    if (!outputPath) {
      this.sink.write(body);
      return;
    }

    const resolved = path.resolve(outputPath);
    await fs.mkdir(path.dirname(resolved), { recursive: true });
    await fs.writeFile(resolved, body, "utf-8");
  }
}

import fs from 'fs';
import path from 'path';
import { PlotService, StringUtils } from 'plotforge';

export interface RenderCommandOptions {
  kind: string;
  options?: string;
  out: string;
}

export interface RenderCommandResult {
  message: string;
  outPath: string;
  sizeBytes: number;
}

/** Read a CSV file, render it and write the PNG next to `out`. */
export class RenderCommand {
  public static Run(csvFile: string, opts: RenderCommandOptions): RenderCommandResult {
    const csvData = fs.readFileSync(csvFile, 'utf8');
    const result = PlotService.GeneratePlot(csvData, opts.kind, opts.options);

    const outPath = path.resolve(opts.out);
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    fs.writeFileSync(outPath, Buffer.from(result.image.data, 'base64'));

    return { message: result.message, outPath, sizeBytes: result.sizeBytes };
  }

  public static Summary(result: RenderCommandResult): string {
    return `${result.message}: ${result.outPath} (${StringUtils.FormatByteSize(result.sizeBytes)})`;
  }
}

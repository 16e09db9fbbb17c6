import { Command } from 'commander';
import { LogHelper, NO_OPTIONS_SENTINEL, PLOT_KINDS } from 'plotforge';
import { RenderCommand } from './RenderCommand';

export function buildProgram(): Command {
  const program = new Command()
    .name('plotforge')
    .description('Render CSV data to PNG charts')
    .option('--log-level <level>', 'Set the logging level', 'WARNING');

  program
    .command('render')
    .description('Render a CSV file to a PNG chart')
    .argument('<csvFile>', 'CSV file with a header row')
    .option('-k, --kind <kind>', `Plot kind (${PLOT_KINDS.join(', ')})`, 'line')
    .option('-o, --options <json>', 'Plot options as a JSON object', NO_OPTIONS_SENTINEL)
    .option('--out <file>', 'Output PNG file', 'plot.png')
    .action((csvFile: string, opts: { kind: string; options: string; out: string }) => {
      LogHelper.Configure({ level: program.opts<{ logLevel: string }>().logLevel, stream: 'stderr' });
      const result = RenderCommand.Run(csvFile, opts);
      console.log(RenderCommand.Summary(result));
    });

  return program;
}

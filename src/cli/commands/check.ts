import { Command, Option } from 'commander';
import { createBackend } from '../../inference/index.js';
import { checkInference } from '../../pipeline/precheck.js';
import { describeInferenceCheck, parseProvider, resolveConfig, type ConfigCliOptions } from '../shared.js';
import { style, icons, formatError } from '../theme.js';

export const checkCommand = new Command('check')
  .description('Verify the inference backend is reachable and the model is installed')
  .option('-c, --config <file>', 'YAML config file')
  .option('-m, --model <name>', 'Model identifier')
  .addOption(new Option('--provider <name>', 'Inference provider: ollama or anthropic').argParser(parseProvider))
  .option('--host <url>', 'Ollama host')
  .action(async (options: ConfigCliOptions) => {
    try {
      const config = resolveConfig(options);
      console.log(style.dim(`Checking ${config.inference.provider} connection...`));

      const check = await checkInference(createBackend(config.inference), config.inference.model);
      const problem = describeInferenceCheck(check, config);
      if (problem) {
        console.error(problem);
        process.exit(1);
      }

      console.log(`${style.success(icons.success)} Model ${style.bold(config.inference.model)} is ready`);
    } catch (error) {
      console.error(formatError(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    }
  });

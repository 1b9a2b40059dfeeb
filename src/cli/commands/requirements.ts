import { Command } from 'commander';
import { loadRequirements } from '../../requirements/loader.js';
import { parsePositiveInt, resolveConfig } from '../shared.js';
import { style, subheader, keyValue, formatError } from '../theme.js';

interface RequirementsOptions {
  config?: string;
  maxChars?: number;
}

export const requirementsCommand = new Command('requirements')
  .description('Show the rubric text exactly as it is sent to the model')
  .argument('[pdf]', 'Rubric PDF (default: rubricPath from config)')
  .option('-c, --config <file>', 'YAML config file')
  .option('--max-chars <n>', 'Character budget for the extracted text', parsePositiveInt)
  .action(async (pdfPath: string | undefined, options: RequirementsOptions) => {
    try {
      const config = resolveConfig({ config: options.config, rubric: pdfPath });
      const maxChars = options.maxChars ?? config.requirements.maxChars;
      const text = await loadRequirements(config.rubricPath, { maxChars });

      console.log(subheader('Requirements'));
      console.log(text);
      console.log();
      console.log(keyValue('Length', `${style.number(String(text.length))} / ${maxChars} characters`));
    } catch (error) {
      console.error(formatError(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    }
  });

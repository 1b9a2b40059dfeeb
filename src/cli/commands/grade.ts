import { Command, Option } from 'commander';
import { resolve } from 'path';
import { createBackend } from '../../inference/index.js';
import { checkInference } from '../../pipeline/precheck.js';
import { gradeSubmissions } from '../../pipeline/run.js';
import { loadRequirements, RequirementsNotFoundError } from '../../requirements/loader.js';
import { ConfigError } from '../../config/loader.js';
import { formatEvent, formatSummary } from '../reporter.js';
import { describeInferenceCheck, parsePositiveInt, parseProvider, resolveConfig, type ConfigCliOptions } from '../shared.js';
import { style, icons, header, keyValue, formatError } from '../theme.js';

interface GradeOptions extends ConfigCliOptions {
  skipCheck?: boolean;
}

export const gradeCommand = new Command('grade')
  .description('Grade every submission archive against the rubric and write the CSV report')
  .argument('[submissions]', 'Directory containing submission archives (default: submissions)')
  .option('-r, --rubric <pdf>', 'Rubric PDF (default: rubric.pdf)')
  .option('-o, --output <csv>', 'Report file, overwritten on each run (default: grades.csv)')
  .option('-c, --config <file>', 'YAML config file (default: grader.config.yaml when present)')
  .option('-m, --model <name>', 'Model identifier (default: codellama:7b)')
  .addOption(new Option('--provider <name>', 'Inference provider: ollama or anthropic').argParser(parseProvider))
  .option('--host <url>', 'Ollama host (default: http://127.0.0.1:11434)')
  .option('--work-dir <dir>', 'Where submissions are extracted while graded (default: OS temp dir)')
  .option('--total <n>', 'Denominator printed after running totals (default: 40)', parsePositiveInt)
  .option('--debug', 'Print raw model responses')
  .option('--skip-check', 'Do not verify the model is installed before grading')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('submission-grader grade')}                                ${style.dim('Grade ./submissions with ./rubric.pdf')}
  ${style.command('submission-grader grade subs -r phase2.pdf -o phase2.csv')}  ${style.dim('Custom paths')}
  ${style.command('submission-grader grade --debug')}                        ${style.dim('Show raw model responses')}
`)
  .action(async (submissionsDir: string | undefined, options: GradeOptions) => {
    try {
      const config = resolveConfig(options, submissionsDir);
      const backend = createBackend(config.inference);

      console.log(header(`${icons.brain} Submission Grader`));
      console.log(keyValue('Submissions', style.path(resolve(config.submissionsDir))));
      console.log(keyValue('Rubric', style.path(resolve(config.rubricPath))));
      console.log(keyValue('Report', style.path(resolve(config.outputPath))));
      console.log(keyValue('Model', `${config.inference.model} ${style.muted(`(${config.inference.provider})`)}`));

      if (!options.skipCheck) {
        console.log(`\n${style.dim(`Checking ${config.inference.provider} connection...`)}`);
        const check = await checkInference(backend, config.inference.model);
        const problem = describeInferenceCheck(check, config);
        if (problem) {
          console.error(problem);
          process.exit(1);
        }
      }

      const requirements = await loadRequirements(config.rubricPath, {
        maxChars: config.requirements.maxChars,
      });
      console.log(keyValue('Requirements', `${style.number(String(requirements.length))} characters`));
      console.log();

      const summary = await gradeSubmissions({
        config,
        backend,
        requirements,
        onEvent: (event) => {
          const lines = formatEvent(event, config.report.totalDenominator);
          if (lines.length > 0) {
            console.log(lines.join('\n'));
          }
        },
      });

      console.log();
      console.log(formatSummary(summary));
      console.log(`\n${style.success(icons.success)} Grading complete. Results saved to ${style.path(config.outputPath)}`);
    } catch (error) {
      if (error instanceof RequirementsNotFoundError) {
        console.error(formatError(error.message, [
          'Pass the rubric with --rubric <pdf>',
          'Or set rubricPath in grader.config.yaml',
        ]));
      } else if (error instanceof ConfigError) {
        console.error(formatError(error.message, ['Fix the value in your config file']));
      } else {
        console.error(formatError(
          error instanceof Error ? error.message : String(error),
          ['Check that the report path is writable', 'Re-run with --debug for raw model output']
        ));
      }
      process.exit(1);
    }
  });

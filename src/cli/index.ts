#!/usr/bin/env node

import { Command } from 'commander';
import { gradeCommand } from './commands/grade.js';
import { checkCommand } from './commands/check.js';
import { requirementsCommand } from './commands/requirements.js';
import { BANNER_MINIMAL, style } from './theme.js';

const program = new Command();

program
  .name('submission-grader')
  .description(`${BANNER_MINIMAL}\n\nGrade zipped code submissions against a PDF rubric with an LLM.`)
  .version('0.1.0')
  .configureHelp({
    sortSubcommands: true,
    subcommandTerm: (cmd) => style.command(cmd.name()) + ' ' + style.dim(cmd.usage()),
  })
  .addHelpText('afterAll', `
${style.bold('Examples:')}

  ${style.dim('# Make sure the model is installed')}
  $ submission-grader check

  ${style.dim('# Preview the rubric text the model will see')}
  $ submission-grader requirements rubric.pdf

  ${style.dim('# Grade ./submissions into grades.csv')}
  $ submission-grader grade -r rubric.pdf

${style.muted('For more info, run any command with --help')}
`);

program.addCommand(gradeCommand);
program.addCommand(checkCommand);
program.addCommand(requirementsCommand);

await program.parseAsync(process.argv);

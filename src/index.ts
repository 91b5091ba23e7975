#!/usr/bin/env node
import { Command } from 'commander';
import dotenv from 'dotenv';
import project from './commands/project.js';
import session from './commands/session.js';
import { reportError } from './commands/shared.js';
import study from './commands/study.js';
import systemCommands from './commands/system.js';
import { PACKAGE, VERSION } from './version.js';

// Load environment variables
dotenv.config();

const program = new Command(PACKAGE.name)
  .description('Study sessions, projects, flashcards, bookmarks and courses from the terminal')
  .version(VERSION);

program.addCommand(session);
program.addCommand(project);
program.addCommand(study);
for (const command of systemCommands) {
  program.addCommand(command);
}

program.parseAsync(process.argv).catch((error: unknown) => reportError('Command', error));

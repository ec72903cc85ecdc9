#!/usr/bin/env node

import { Command, Option } from 'commander';
import { startCommand } from './commands/start.js';
import {
  parseDurationOption,
  parseEventOption,
  parseLogLevelOption,
  parseModeOption,
  parseSoundOption,
  parseStyleOption,
  parseSwitchOption,
} from './commands/options.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('tock')
  .description('Countdown, timer, pomodoro, event and local time clocks in the terminal')
  .version(VERSION)
  .option('-c, --countdown <duration>', 'Countdown duration, e.g. "5:00", "1d 10", "1y 5d 10:30:00"', parseDurationOption)
  .option('-w, --work <duration>', 'Pomodoro work duration', parseDurationOption)
  .option('-p, --pause <duration>', 'Pomodoro pause duration', parseDurationOption)
  .option('-e, --event <event>', 'Event target, "YYYY-MM-DD HH:MM:SS" or "time=...,title=..."', parseEventOption)
  .option('-m, --mode <mode>', 'Mode to start in: countdown|c, timer|t, pomodoro|p, event|e, localtime|l', parseModeOption)
  .option('-s, --style <style>', 'Digit style: full, dark, medium, light, braille, thick, cross', parseStyleOption)
  .option('-d, --decis', 'Show deciseconds')
  .option('--no-met', 'Stop the countdown at zero instead of counting Mission Elapsed Time')
  .option('-n, --notification <on|off>', 'Desktop notifications', parseSwitchOption)
  .option('--blink <on|off>', 'Flash the clock when it finishes', parseSwitchOption)
  .option('--sound <path>', 'Sound file (.mp3 or .wav) played when a clock finishes', parseSoundOption)
  .option('-r, --reset', 'Clear the saved state before starting')
  .addOption(
    new Option('--log-level <level>', 'Log level: debug, info, warn, error')
      .argParser(parseLogLevelOption)
      .default('info')
  )
  .action(startCommand);

await program.parseAsync();

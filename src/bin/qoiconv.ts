#!/usr/bin/env node

import fs from 'fs';
import path from 'path';
import { Command } from 'commander';
import { convertFile } from '../convert';
import { getErrorMessage, logError, logInfo, logWarn, styleKV } from '../logger';
import pkg from '../../package.json';

new Command()
  .name('qoiconv')
  .description('Convert images between QOI, PNG, PPM and PAM.')
  .version(pkg.version, '-v, --version', 'Show version')
  .argument('<input_file>', 'Input image (.qoi or .png)')
  .argument('<output_file>', 'Output image (.qoi, .png, .ppm or .pam)')
  .option('-q, --quiet', 'Do not print a summary')
  .helpOption('-h, --help', 'Show help')
  .action(async (inputFile: string, outputFile: string, opts: { quiet?: boolean }) => {
    try {
      const outputPath = path.resolve(outputFile);
      if (fs.existsSync(outputPath)) logWarn(`Overwriting ${outputPath}`);

      const image = await convertFile(path.resolve(inputFile), outputPath);
      if (!opts.quiet) {
        logInfo(styleKV('Size', `${image.width}x${image.height}`));
        logInfo(styleKV('Output', outputPath));
      }
    } catch (err) {
      logError(getErrorMessage(err));
      process.exitCode = 1;
    }
  })
  .parseAsync()
  .catch((err: unknown) => {
    logError(getErrorMessage(err));
    process.exitCode = 1;
  });

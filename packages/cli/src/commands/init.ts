/**
 * gdfmt init
 *
 * Writes gdfmt.json with the default configuration.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { CLIOptions } from '../index';
import { EXIT_CODE } from '../index';
import { CONFIG_FILE, getDefaultConfigJSON } from '../config';

interface InitResult {
  created: boolean;
  configFile: string;
}

export function initCommand(options: CLIOptions, args: string[]): number {
  const force = args.includes('--force');
  const configFile = options.configPath ?? CONFIG_FILE;

  if (fs.existsSync(configFile) && !force) {
    const result: InitResult = { created: false, configFile };
    if (options.format === 'json') {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(`  ${configFile} already exists.`);
      console.log('  Use --force to overwrite.');
    }
    return EXIT_CODE.SUCCESS;
  }

  const dir = path.dirname(configFile);
  if (dir !== '.') {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(configFile, `${getDefaultConfigJSON()}\n`);

  const result: InitResult = { created: true, configFile };
  if (options.format === 'json') {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(`  Created ${configFile}`);
    console.log('');
    console.log('  Next steps:');
    console.log('    1. Set engine.kind to "none" if topiary is not installed');
    console.log('    2. Run: gdfmt <files> --check');
  }

  return EXIT_CODE.SUCCESS;
}

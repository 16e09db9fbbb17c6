#!/usr/bin/env node

/*
 * Copyright 2026 Mark Isham
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */


import { ErrorHelper } from 'plotforge';
import { buildProgram } from './program';

// Ad-hoc rendering from the command line: CSV file in, PNG file out.

async function main() {
  try {
    await buildProgram().parseAsync(process.argv);
  } catch (err) {
    ErrorHelper.LogError(err, 'plotforge render');
    console.error(ErrorHelper.Describe(err));
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}

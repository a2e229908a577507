/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { codegenCommands } from './codegen.js';
import { diagnosticCommands } from './diagnostics.js';
import { navigationCommands } from './navigation.js';
import { projectCommands } from './project.js';
import { refactorCommands } from './refactor.js';
import type { CommandDescriptor } from './registry.js';

export const builtinCommands: readonly CommandDescriptor[] = [
  ...navigationCommands,
  ...diagnosticCommands,
  ...refactorCommands,
  ...codegenCommands,
  ...projectCommands,
];

export { CommandRegistry, defineCommand } from './registry.js';
export type {
  CommandDescriptor,
  CommandSpec,
  PreparedCommand,
  ProtocolStep,
  StepContext,
} from './registry.js';

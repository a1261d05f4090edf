#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { createAgentProgram } from '../agent.js';
import { runProgram } from './run.js';

await runProgram(createAgentProgram());

#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { createAdminProgram } from '../admin.js';
import { runProgram } from './run.js';

await runProgram(createAdminProgram());

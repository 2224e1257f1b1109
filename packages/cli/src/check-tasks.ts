#!/usr/bin/env node

import { createCheckTasksProgram, runProgram } from './programs';

void runProgram(createCheckTasksProgram());

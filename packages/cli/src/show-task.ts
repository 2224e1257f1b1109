#!/usr/bin/env node

import { createShowTaskProgram, runProgram } from './programs';

void runProgram(createShowTaskProgram());

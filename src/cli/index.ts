#!/usr/bin/env node
/**
 * pbxpatch CLI
 *
 * Registers source files in Xcode project.pbxproj files
 */
import { createProgram } from './program.js';

createProgram().parse();

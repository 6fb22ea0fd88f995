#!/usr/bin/env node
import { CLIManager } from './cli/index'

new CLIManager().parse(process.argv)

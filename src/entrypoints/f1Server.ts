#!/usr/bin/env node
// Formula One MCP server executable.
import { f1ServerDefinition } from '../providers/f1/f1Tools';
import { runServer } from '../server';

runServer(f1ServerDefinition);

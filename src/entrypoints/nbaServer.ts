#!/usr/bin/env node
// NBA MCP server executable.
import { nbaServerDefinition } from '../providers/nba/nbaTools';
import { runServer } from '../server';

runServer(nbaServerDefinition);

#!/usr/bin/env node
/**
 * docmeta - CLI Entry Point
 *
 * Usage:
 *   docmeta                         # single file from GCS_INPUT_PATH
 *   docmeta --batch                 # every supported file under the input
 *   docmeta --video <youtube url>   # one video
 *   node dist/index.js              # direct invocation
 *
 * @module bin
 */

import './index.js';

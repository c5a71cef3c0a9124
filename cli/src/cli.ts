#!/usr/bin/env node
import { runMain } from 'citty'
import { root } from './index.js'

await runMain(root)

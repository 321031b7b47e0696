#!/usr/bin/env node

import { createProgram } from './program'
import { errorMessage } from './errors'

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(errorMessage(err))
    process.exitCode = 1
  })

#!/usr/bin/env -S node --enable-source-maps

import { main } from './rlib-factory-cli'

main()

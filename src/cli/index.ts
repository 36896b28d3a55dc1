#!/usr/bin/env node
/**
 * sky-briefing CLI
 *
 * Commands:
 *   sky-briefing briefing <lat> <lon> [when]   Daily briefing as prose
 *   sky-briefing tonight <lat> <lon> [when]    Evening summary
 *   sky-briefing json <lat> <lon> [when]       Daily briefing as JSON
 *   sky-briefing phase [when]                  Moon phase
 *   sky-briefing showers [date]                Meteor showers
 *   sky-briefing eclipses [date]               Eclipses in the coming year
 */

import { runCli } from './run.js'

async function main() {
  process.exitCode = await runCli(process.argv.slice(2), {
    out: line => console.log(line),
    err: line => console.error(line),
    env: process.env,
  })
}

main().catch(err => {
  console.error(err instanceof Error ? err.message : String(err))
  process.exit(1)
})

#!/usr/bin/env tsx
/* eslint-disable no-console */
import { Chip8System } from '@core/system/system'
import { disasmAt, formatTraceLine } from '@utils/disasmChip8'
import { getEnv } from '@utils/env'

function parseArgs() {
  const argv = process.argv.slice(2)
  let image = getEnv('IMAGE') || ''
  let max = parseInt(getEnv('TRACE_MAX') || '0', 10)
  let allowOversize = false
  for (const a of argv) {
    if (a.startsWith('--max=')) max = parseInt(a.slice(6), 10)
    else if (a === '--allow-oversize') allowOversize = true
    else if (!a.startsWith('-')) image = a
  }
  return { image, max, allowOversize }
}

async function main() {
  const args = parseArgs()
  if (!args.image) { console.error('Usage: tsx scripts/trace-image.ts <image> [--max=N] [--allow-oversize]'); process.exit(2) }
  const sys = new Chip8System()
  sys.loadImageFile(args.image, { allowOversize: args.allowOversize })
  const cpu = sys.cpu
  const maxInst = args.max > 0 ? args.max : 1000

  for (let i = 0; i < maxInst; i++) {
    const pc = cpu.state.pc
    const dis = disasmAt((addr) => sys.memory.read(addr), pc)
    console.log(formatTraceLine(pc, dis, cpu.state, cpu.state.cycles))
    sys.step()
  }
}

main().catch((e) => { console.error(e instanceof Error ? e.message : e); process.exit(1) })

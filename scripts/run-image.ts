#!/usr/bin/env tsx
/* eslint-disable no-console */
/*
  Run a CHIP-8 image headless and write a PNG of the final framebuffer.
  Usage:
    tsx scripts/run-image.ts <image> [--cycles=20000] [--scale=8] [--out=out/screen.png] [--keys=1,A]
*/
import fs from 'node:fs'
import path from 'node:path'
import { PNG } from 'pngjs'
import { runImage } from '@core/harness/headless'
import { loadImageFile } from '@core/image/image'
import { DISPLAY_HEIGHT, DISPLAY_WIDTH, BYTES_PER_PIXEL } from '@core/display/display'
import { frameFingerprint } from '@utils/fingerprint'
import { getEnv } from '@utils/env'

interface CliOptions { image: string; cycles: number; scale: number; outPath: string; keys: number[] }

function usage(): never {
  console.error('Usage: tsx scripts/run-image.ts <image> [--cycles=N] [--scale=N] [--out=path.png] [--keys=1,A]')
  process.exit(2)
}

function parseArgs(): CliOptions {
  const argv = process.argv.slice(2)
  let image = getEnv('IMAGE') || ''
  let cycles = parseInt(getEnv('RUN_CYCLES') || '20000', 10)
  let scale = 8
  let outPath = ''
  let keys: number[] = []
  for (const a of argv) {
    if (a.startsWith('--cycles=')) cycles = parseInt(a.slice(9), 10)
    else if (a.startsWith('--scale=')) scale = parseInt(a.slice(8), 10)
    else if (a.startsWith('--out=')) outPath = a.slice(6)
    else if (a.startsWith('--keys=')) keys = a.slice(7).split(',').filter(Boolean).map((k) => parseInt(k, 16) & 0xF)
    else if (!a.startsWith('-')) image = a
  }
  if (!image) usage()
  if (!Number.isFinite(cycles) || cycles <= 0) cycles = 20000
  if (!Number.isFinite(scale) || scale <= 0) scale = 8
  if (!outPath) outPath = path.resolve(`out/${path.basename(image).replace(/\.[^.]+$/, '')}.png`)
  return { image, cycles, scale, outPath, keys }
}

const writePngScaled = async (outPath: string, fb: Uint8Array, scale: number): Promise<void> => {
  const W = DISPLAY_WIDTH * scale, H = DISPLAY_HEIGHT * scale
  const png = new PNG({ width: W, height: H })
  for (let y = 0; y < DISPLAY_HEIGHT; y++) {
    for (let x = 0; x < DISPLAY_WIDTH; x++) {
      const src = (y * DISPLAY_WIDTH + x) * BYTES_PER_PIXEL
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W
        for (let dx = 0; dx < scale; dx++) {
          const o = ((oy + (x * scale + dx)) << 2)
          png.data[o + 0] = fb[src]
          png.data[o + 1] = fb[src + 1]
          png.data[o + 2] = fb[src + 2]
          png.data[o + 3] = 255
        }
      }
    }
  }
  fs.mkdirSync(path.dirname(outPath), { recursive: true })
  const stream = fs.createWriteStream(outPath)
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve())
    stream.on('error', (e) => reject(e))
    png.pack().pipe(stream)
  })
}

async function main(): Promise<void> {
  const args = parseArgs()
  const image = loadImageFile(args.image)
  const { sys, result } = runImage(image, { maxCycles: args.cycles, keys: args.keys })
  await writePngScaled(args.outPath, sys.framebuffer, args.scale)
  const frame = frameFingerprint(sys.display)
  console.log(JSON.stringify({ image: args.image, ...result, lit: sys.display.litCount(), frame, png: args.outPath }))
  if (result.reason === 'fail') process.exit(1)
}

main().catch((e) => { console.error(e); process.exit(1) })

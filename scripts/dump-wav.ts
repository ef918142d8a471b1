#!/usr/bin/env tsx
/*
  Dump the sound-timer tone of a CHIP-8 image to WAV (PCM16LE, mono).
  Usage:
    tsx scripts/dump-wav.ts <image> [--seconds 5] [--sr 44100] [--hz 500] [--out out.wav]
*/
import { mkdir, writeFile } from 'node:fs/promises'
import { basename, dirname, resolve } from 'node:path'
import { Chip8System } from '@core/system/system'
import { SquareWave } from '@host/node/squareWave'

interface CliOptions { imagePath: string; seconds: number; sampleRate: number; stepsPerSecond: number; outPath: string }

const parseArgs = (): CliOptions => {
  const argv = process.argv.slice(2)
  if (argv.length === 0) {
    console.error('Usage: dump-wav <image> [--seconds 5] [--sr 44100] [--hz 500] [--out out.wav]')
    process.exit(1)
  }
  let imagePath = ''
  let seconds = 5
  let sampleRate = 44100
  let stepsPerSecond = 500
  let outPath = ''
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]
    if (a === '--seconds' || a === '-s') { seconds = Math.max(1, Number(argv[++i] || 5)) }
    else if (a === '--sr' || a === '-r') { sampleRate = Math.max(8000, Number(argv[++i] || 44100)) }
    else if (a === '--hz') { stepsPerSecond = Math.max(60, Number(argv[++i] || 500)) }
    else if (a === '--out' || a === '-o') { outPath = String(argv[++i] || '') }
    else if (a.startsWith('-')) { /* skip unknown flag */ }
    else { imagePath = a }
  }
  if (!imagePath) { console.error('Missing image path'); process.exit(1) }
  outPath = outPath ? resolve(outPath) : resolve(`out/${basename(imagePath).replace(/\.[^.]+$/, '')}_${sampleRate}Hz.wav`)
  return { imagePath, seconds, sampleRate, stepsPerSecond, outPath }
}

const writeWavPCM16 = async (filePath: string, pcm: Int16Array, sampleRate: number): Promise<void> => {
  const dataBytes = pcm.length * 2
  const header = Buffer.alloc(44)
  header.write('RIFF', 0)
  header.writeUInt32LE(36 + dataBytes, 4)
  header.write('WAVE', 8)
  header.write('fmt ', 12)
  header.writeUInt32LE(16, 16) // PCM fmt chunk size
  header.writeUInt16LE(1, 20)  // PCM format
  header.writeUInt16LE(1, 22)  // mono
  header.writeUInt32LE(sampleRate, 24)
  header.writeUInt32LE(sampleRate * 2, 28)
  header.writeUInt16LE(2, 32) // block align
  header.writeUInt16LE(16, 34) // bits per sample
  header.write('data', 36)
  header.writeUInt32LE(dataBytes, 40)
  const body = Buffer.from(pcm.buffer, pcm.byteOffset, pcm.byteLength)
  await mkdir(dirname(filePath), { recursive: true })
  await writeFile(filePath, Buffer.concat([header, body]))
}

const main = async (): Promise<void> => {
  const opts = parseArgs()
  const sys = new Chip8System()
  sys.loadImageFile(resolve(opts.imagePath))
  const wave = new SquareWave({ sampleRate: opts.sampleRate })
  const total = Math.round(opts.seconds * opts.sampleRate)
  const pcm = new Int16Array(total)
  const samplesPerStep = opts.sampleRate / opts.stepsPerSecond
  const block = new Float32Array(1)
  let owed = 0
  let written = 0
  while (written < total) {
    sys.step()
    owed += samplesPerStep
    const gate = sys.soundTimer > 0
    while (owed >= 1 && written < total) {
      wave.render(block, gate)
      pcm[written++] = Math.round(block[0] * 32767)
      owed -= 1
    }
  }
  await writeWavPCM16(opts.outPath, pcm, opts.sampleRate)
  console.log(`WAV written: ${opts.outPath}`)
}

main().catch((e) => { console.error(e); process.exit(1) })

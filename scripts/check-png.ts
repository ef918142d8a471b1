/* eslint-disable no-console */
import fs from 'node:fs'
import { PNG } from 'pngjs'

function usage(): never {
  console.error('Usage: tsx scripts/check-png.ts <path>')
  process.exit(2)
}

const pathArg = process.argv[2]
if (!pathArg) usage()
if (!fs.existsSync(pathArg)) {
  console.error(`File not found: ${pathArg}`)
  process.exit(2)
}

// A screenshot is monochrome: every pixel is either black or white
fs.createReadStream(pathArg)
  .pipe(new PNG())
  .on('parsed', function parsed(this: PNG) {
    const { width: w, height: h, data } = this
    let lit = 0
    let stray = 0
    for (let i = 0; i < data.length; i += 4) {
      const r = data[i], g = data[i + 1], b = data[i + 2]
      if (r === 255 && g === 255 && b === 255) lit++
      else if (r !== 0 || g !== 0 || b !== 0) stray++
    }
    const total = w * h
    const pct = total > 0 ? (100 * lit / total) : 0
    const ok = stray === 0 && lit > 0
    console.log(JSON.stringify({ path: pathArg, width: w, height: h, lit, stray, lit_pct: +pct.toFixed(2), ok }))
    process.exit(ok ? 0 : 1)
  })
  .on('error', (e: Error) => { console.error(e); process.exit(1) })

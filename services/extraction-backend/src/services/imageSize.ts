export type ImageDimensions = {
  width: number
  height: number
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]

function readUInt32BE(bytes: Uint8Array, offset: number) {
  return ((bytes[offset] << 24) >>> 0) + (bytes[offset + 1] << 16) + (bytes[offset + 2] << 8) + bytes[offset + 3]
}

function readUInt16BE(bytes: Uint8Array, offset: number) {
  return (bytes[offset] << 8) + bytes[offset + 1]
}

function isPng(bytes: Uint8Array) {
  return bytes.length >= 24 && PNG_SIGNATURE.every((value, index) => bytes[index] === value)
}

function isJpeg(bytes: Uint8Array) {
  return bytes.length >= 4 && bytes[0] === 0xff && bytes[1] === 0xd8
}

function readJpegDimensions(bytes: Uint8Array): ImageDimensions | null {
  let offset = 2
  while (offset + 9 < bytes.length) {
    if (bytes[offset] !== 0xff) return null
    // Any number of 0xFF fill bytes may precede a marker.
    if (bytes[offset + 1] === 0xff) {
      offset += 1
      continue
    }
    const marker = bytes[offset + 1]
    const segmentLength = readUInt16BE(bytes, offset + 2)
    // SOF0..SOF15, excluding DHT (C4), JPG (C8) and DAC (CC)
    if (marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc) {
      return {
        height: readUInt16BE(bytes, offset + 5),
        width: readUInt16BE(bytes, offset + 7)
      }
    }
    offset += 2 + segmentLength
  }
  return null
}

// Reads pixel dimensions from a PNG IHDR chunk or a JPEG SOF segment.
export function readImageDimensions(bytes: Uint8Array): ImageDimensions | null {
  if (isPng(bytes)) {
    return { width: readUInt32BE(bytes, 16), height: readUInt32BE(bytes, 20) }
  }
  if (isJpeg(bytes)) {
    return readJpegDimensions(bytes)
  }
  return null
}


export { parseExifData, parseExifFromJpeg, readExif } from './parser'
export * from './types'

export { Content, STOP, type ByteVisitor, type Stop } from "./content.js"
export { Cursor, position, type Position } from "./cursor.js"
export { Text } from "./text.js"

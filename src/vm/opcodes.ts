/**
 * Opcodes of the optimized instruction stream.
 */
enum OpCodes {
  ADJ = 0, // add a signed delta to the current cell
  MOV = 1, // move the pointer by a signed delta
  JZ = 2, // loop open: jump past the matching close when the cell is zero
  JNZ = 3, // loop close: jump back into the body when the cell is non-zero
  IN = 4,
  OUT = 5,
  DUMP = 6, // print machine state (opt-in '#')
}

export default OpCodes;

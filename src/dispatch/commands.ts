/**
 * @file Command opcodes accepted by the dispatcher.
 * @module dispatch/commands
 */

export const CMD_WRITE = 0x01;
export const CMD_READ = 0x02;
export const CMD_STATUS = 0x03;
export const CMD_ECHO = 0x04;

/** Reply to a completed WRITE */
export const REPLY_ACK = 0x06;
/** Reply to an unknown opcode */
export const REPLY_NAK = 0x15;

/** Byte shifted out while reading */
export const READ_FILLER = 0x00;

export type CommandName = 'write' | 'read' | 'status' | 'echo';

const OPCODES: Record<number, CommandName> = {
  [CMD_WRITE]: 'write',
  [CMD_READ]: 'read',
  [CMD_STATUS]: 'status',
  [CMD_ECHO]: 'echo',
};

/**
 * Maps an opcode byte to its command, or undefined for unknown opcodes.
 */
export function decodeCommand(opcode: number): CommandName | undefined {
  return OPCODES[opcode & 0xff];
}

/** Commands that take a data byte after the opcode. */
export function takesOperand(command: CommandName): boolean {
  return command === 'write' || command === 'echo';
}

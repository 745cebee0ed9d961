/**
 * Storage and container primitives shared by the IR entities
 */

export { Arena, Handle } from "./arena.js";
export { Error as IrError, ErrorCode, ErrorMessages } from "./errors.js";
export { KeyedSet } from "./keyed-set.js";
export { LinkedList, type ListLinks } from "./linked-list.js";

/**
 * Base error class for packet codec faults.
 */
export class PacketError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'PacketError'
  }
}

/**
 * Raised when a buffer is shorter than a layer's minimum size or a mandatory
 * sub-field is empty.
 */
export class MalformedInputError extends PacketError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'MalformedInputError'
  }
}

/**
 * Raised when a protocol decoder is handed bytes whose embedded type code
 * belongs to a different protocol.
 */
export class TypeMismatchError extends PacketError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'TypeMismatchError'
  }
}

/**
 * Raised when a declared or derived length disagrees with the buffer size or
 * breaks the protocol's length unit.
 */
export class InconsistentLengthError extends PacketError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'InconsistentLengthError'
  }
}

/**
 * Raised by `build()` when a required builder slot is absent or malformed.
 */
export class InvalidBuilderStateError extends PacketError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'InvalidBuilderStateError'
  }
}

/**
 * Raised when a (contract, discriminator) pair is registered twice.
 */
export class RegistryConflictError extends PacketError {
  constructor(message: string) {
    super(message)
    this.name = 'RegistryConflictError'
  }
}

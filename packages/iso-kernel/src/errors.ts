/**
 * Raised when a shape's transform cannot be inverted (a scale component is
 * exactly zero). Not recoverable: the settings layer must clamp scale inputs
 * to a positive minimum before they reach the kernel.
 */
export class InvalidShapeConfiguration extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidShapeConfiguration';
  }
}

/**
 * docforge Typed Error Hierarchy
 *
 * Structured error classes with machine-readable codes and optional context.
 */

export class DocForgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocForgeError';
    // Maintain proper prototype chain for instanceof checks in transpiled JS
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DiagramConversionError extends DocForgeError {
  constructor(
    message: string,
    public readonly diagramId: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'DIAGRAM_CONVERSION_ERROR', context);
    this.name = 'DiagramConversionError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ImageResolutionError extends DocForgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'IMAGE_RESOLUTION_ERROR', context);
    this.name = 'ImageResolutionError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RenderError extends DocForgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RENDER_ERROR', context);
    this.name = 'RenderError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ExportError extends DocForgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'EXPORT_ERROR', context);
    this.name = 'ExportError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TemplateError extends DocForgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TEMPLATE_ERROR', context);
    this.name = 'TemplateError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends DocForgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends DocForgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', context);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * ILayoutEngine - Graph layout backend interface
 *
 * Lays out a DOT document and returns it as SVG. The default implementation
 * runs Graphviz compiled to WebAssembly; tests substitute a fake.
 *
 * @module
 */

/**
 * @example
 * ```typescript
 * const engine = new VizLayoutEngine();
 * const svg = await engine.layout('digraph { a -> b }');
 * ```
 */
export interface ILayoutEngine {
  /**
   * Lay out a DOT document as SVG
   * @throws RenderError if the engine rejects the document
   */
  layout(dot: string): Promise<string>;
}

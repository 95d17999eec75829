/**
 * Template-Line Renderer
 * @module render/template-renderer
 *
 * Renders the deployment-template fragment: one guarded block per option,
 * forwarding `.Values.<root>.<key>` to the controller's `--<flag>` argument.
 */

import type { ChartOption } from '../types/chart-options.js';

export interface TemplateRenderOptions {
  /** Spaces before every line (default: 8, the container args level) */
  indent?: number;
  /** Values section holding the keys (default: `configuration`) */
  valuesRoot?: string;
}

export const DEFAULT_TEMPLATE_INDENT = 8;
export const DEFAULT_VALUES_ROOT = 'configuration';

/**
 * Render the three lines for one option.
 * The argument keeps the original flag name; only the value references use the key.
 */
export function renderTemplateBlock(
  option: Pick<ChartOption, 'flag' | 'key'>,
  { indent = DEFAULT_TEMPLATE_INDENT, valuesRoot = DEFAULT_VALUES_ROOT }: TemplateRenderOptions = {}
): string[] {
  const pad = ' '.repeat(indent);
  const ref = `.Values.${valuesRoot}.${option.key}`;

  return [
    `${pad}{{- if ${ref} }}`,
    `${pad}- --${option.flag.name}={{ ${ref} }}`,
    `${pad}{{- end }}`,
  ];
}

/**
 * Render all blocks in option order, with no separator lines between them
 */
export function renderTemplateLines(
  options: readonly ChartOption[],
  renderOptions: TemplateRenderOptions = {}
): string[] {
  return options.flatMap((option) => renderTemplateBlock(option, renderOptions));
}

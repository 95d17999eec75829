/**
 * Rendering Module
 * @module render
 */

export {
  type TemplateRenderOptions,
  DEFAULT_TEMPLATE_INDENT,
  DEFAULT_VALUES_ROOT,
  renderTemplateBlock,
  renderTemplateLines,
} from './template-renderer.js';

export {
  type ConfigurationRenderOptions,
  DEFAULT_VALUES,
  lookupDefault,
  formatDefaultValue,
  renderConfigurationLine,
  renderConfigurationStanza,
} from './configuration-renderer.js';

/**
 * Report generation module.
 * Renders gathered facts as JSON, YAML or a text summary.
 */

export {
  generateJSON,
  generateText,
  renderFacts,
  serializeJSON,
  serializeYAML,
} from './reporter.js';

export {
  ConditionalExpander,
  expandResources,
  type ExpanderOptions,
  type ResourceInstance,
} from './conditional-expander';

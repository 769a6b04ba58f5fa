export {
  MESSAGE_TEMPLATES,
  SECTION_SEPARATOR,
  TemplateError,
  renderTemplate,
  selectTemplate,
  validateTemplate,
  type MessageShape,
  type MessageTemplates,
  type TemplateFields,
  type TemplatePlaceholder,
} from './message-templates.js';

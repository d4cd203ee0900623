/**
 * Widget name for logging
 */
export const WIDGET_NAME = 'OptionSync';

/**
 * DOM readiness polling policies
 */
export const POLLING = {
  /** Initial attach: one deferred check for the owner control */
  ATTACH_MAX_ATTEMPTS: 1,
  ATTACH_INTERVAL_MS: 0,

  /** Dependent option checkboxes can render after the owner control */
  OPTIONS_MAX_ATTEMPTS: 10,
  OPTIONS_INTERVAL_MS: 200,

  /** Dependent field container discovery */
  FIELD_MAX_ATTEMPTS: 20,
  FIELD_INTERVAL_MS: 500,
} as const;

/**
 * Deferred scheduling delays
 */
export const TIMING = {
  /** Delay between an owner change event and the sync run (ms) */
  OWNER_CHANGE_DELAY_MS: 100,

  /** Delay before loading an owner already selected on page load (ms) */
  INITIAL_LOAD_DELAY_MS: 500,

  /** Layout passes scheduled after attach (ms) */
  STYLE_PASS_DELAYS_MS: [100, 500, 1000],

  /** Coalescing window for option list re-renders (ms) */
  MUTATION_RELOAD_DELAY_MS: 200,
} as const;

/**
 * Network-related constants
 */
export const NETWORK = {
  /** Request timeout duration (ms) */
  REQUEST_TIMEOUT_MS: 10000,

  /** HTTP status whose body may carry an error detail */
  DETAILED_ERROR_STATUS: 500,
} as const;

/**
 * Default collaborator endpoints
 */
export const ENDPOINTS = {
  ALLOWED_OPTIONS: '/admin/parametre/userprocessusrole/get_processus/',
  ASSIGNED_SECONDARY: '/admin/parametre/userprocessusrole/get_user_roles/',
  ASSIGNMENT_SCREEN: '/admin/parametre/userprocessus/add/',
  OWNER_PARAM: 'owner_id',
} as const;

/**
 * Default DOM selectors for the admin form
 */
export const SELECTORS = {
  OWNER: '#id_user',
  DEPENDENT_FIELD: '.field-processus_multiple',
  SECONDARY_LIST: '#id_roles',
  STYLED_LISTS: [
    '#id_roles',
    '#id_processus_multiple',
    '.field-roles ul',
    '.field-processus_multiple ul',
    'ul.compact-checkboxes',
  ],
  CHECKBOX: 'input[type="checkbox"]',
  HELP: '.help',
  CONFIG_SCRIPT: 'script#optionsync-config[type="application/json"]',
} as const;

/**
 * localStorage key that turns debug logging on
 */
export const DEBUG_STORAGE_KEY = 'optionsync:debug';

/**
 * User-facing feedback texts
 */
export const MESSAGES = {
  LOADING: 'Loading options...',
  SYNCED: (count: number) =>
    `Options already assigned are checked automatically (${count}). You can select others.`,
  EMPTY_PREFIX: 'No options are assigned to this owner. Please assign options first in ',
  EMPTY_LINK: 'Option assignments',
  EMPTY_SUFFIX: '.',
  TRANSPORT_ERROR: 'Error while loading options. Please try again.',
  DETAIL_PREFIX: 'Details: ',
  NOT_FOUND: 'Error: unable to find the option checkboxes.',
} as const;

/**
 * Layout contract applied to every checkbox list
 */
export const LAYOUT = {
  LIST: {
    'list-style': 'none',
    padding: '8px',
    margin: '0',
    display: 'grid',
    'grid-template-columns': 'repeat(auto-fill, minmax(200px, 1fr))',
    gap: '2px',
    'max-height': '300px',
    'overflow-y': 'auto',
    'overflow-x': 'hidden',
    border: '1px solid #ddd',
    'border-radius': '4px',
    'background-color': '#fafafa',
  },
  ITEM: {
    margin: '0',
    padding: '3px 5px',
    'border-radius': '2px',
    'font-size': '12px',
    'line-height': '1.4',
  },
  LABEL: {
    display: 'flex',
    'align-items': 'center',
    'font-size': '12px',
    margin: '0',
    padding: '1px 0',
    'white-space': 'nowrap',
    overflow: 'hidden',
    'text-overflow': 'ellipsis',
    color: '#000',
  },
  CHECKBOX: {
    'margin-right': '5px',
    width: '14px',
    height: '14px',
    'flex-shrink': '0',
    cursor: 'pointer',
  },
  /** Declarations that must win over the admin stylesheet */
  IMPORTANT: ['list-style'],
} as const;

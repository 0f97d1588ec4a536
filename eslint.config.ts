import js from '@eslint/js';
import tseslint from 'typescript-eslint';
import prettier from 'eslint-config-prettier';

export default [
  js.configs.recommended,
  ...tseslint.configs.recommended,
  prettier,
  {
    rules: {
      '@typescript-eslint/no-explicit-any': 'error',
      '@typescript-eslint/no-non-null-assertion': 'error',
      '@typescript-eslint/no-unused-vars': [
        'error',
        {
          argsIgnorePattern: '^_',
          varsIgnorePattern: '^_',
        },
      ],
      'no-console': [
        'warn',
        {
          allow: ['warn', 'error'],
        },
      ],
    },
  },
  {
    ignores: ['dist', 'node_modules', 'coverage'],
  },
  // The layout passes are pure; keep clocks and randomness out of them.
  {
    files: ['src/layout/**/*.ts', 'src/compiler/**/*.ts'],
    rules: {
      'no-restricted-properties': [
        'error',
        {
          object: 'Math',
          property: 'random',
          message: 'Layout and compilation must be deterministic.',
        },
        {
          object: 'Date',
          property: 'now',
          message: 'Layout and compilation must be deterministic.',
        },
      ],
    },
  },
  {
    files: ['benches/**/*.ts', 'tests/**/*.ts'],
    languageOptions: {
      parser: tseslint.parser,
      // Benches and tests live outside `src`; no type-aware linting there.
      parserOptions: {},
    },
    rules: {
      // keep same baseline rules for benches
    },
  },
];

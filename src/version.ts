/** Program name, used in the User-Agent and `--version` output. */
export const NAME = 'catalog-cli';

/** Program version, kept in step with package.json. */
export const VERSION = '0.1.0';

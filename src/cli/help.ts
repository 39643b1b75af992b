import { Command } from 'commander';

const INTRO = `CLI de extracción de perfiles de Hashdive sobre el WebSocket de Streamlit.

Los argumentos de fetch se pueden definir vía CLI, archivo YAML y variables de entorno.
La precedencia es: CLI > archivo de configuración > variables de entorno > valores por defecto.`;

const EXAMPLES = `
Ejemplos:
  hashdive-stream session
  hashdive-stream check --json
  hashdive-stream user 0x0000000000000000000000000000000000000001
  hashdive-stream fetch --input data/pages/users.csv --concurrency 4 --pool-size 4
  hashdive-stream fetch --config fetch.yaml --limit 50 --refetch
  hashdive-stream replay logs/messages/0x0000000000000000000000000000000000000001.frames.json
`;

export function attachHelp(program: Command): void {
  program.addHelpText('beforeAll', `${INTRO}\n`);
  program.addHelpText('afterAll', EXAMPLES);
  program.configureHelp({
    commandUsage: () => 'hashdive-stream <comando> [opciones]',
  });
}

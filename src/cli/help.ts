import { Command } from 'commander';

const INTRO = `Exporta el historial de transacciones y el efectivo disponible de Trade Republic.

Los ajustes se pueden definir vía CLI, archivo YAML (--config, por defecto config.yaml) y variables de entorno.
La precedencia es: CLI > archivo de configuración > variables de entorno > valores por defecto.`;

const EXAMPLES = `
Ejemplos:
  tr-export --format csv --out exports
  tr-export sync --details --config config.yaml
  tr-export login --json
  TR_SESSION_TOKEN=<token> tr-export --no-details
`;

export function attachHelp(program: Command): void {
  program.addHelpText('beforeAll', `${INTRO}\n`);
  program.addHelpText('afterAll', EXAMPLES);
  program.configureHelp({
    commandUsage: () => 'tr-export [comando] [opciones]',
  });
}

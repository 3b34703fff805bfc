import { RemotePaths } from '../interfaces';
import { PipelineConfigError } from './errors';

const PLACEHOLDERS: ReadonlySet<string> = new Set<keyof RemotePaths>([
  'input_dir',
  'output_dir',
  'database',
]);

function isPlaceholder(name: string): name is keyof RemotePaths {
  return PLACEHOLDERS.has(name);
}

/**
 * Fills {input_dir}, {output_dir} and {database} in a pipeline command.
 * "{{" and "}}" stand for literal braces. Values are inserted as they are.
 */
export function formatCommand(template: string, paths: RemotePaths): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i];

    if (char === '{') {
      if (template[i + 1] === '{') {
        result += '{';
        i += 2;
        continue;
      }

      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        throw new PipelineConfigError(
          `Unclosed '{' at position ${i} in pipeline_command`
        );
      }

      const name = template.slice(i + 1, close);
      if (!isPlaceholder(name)) {
        throw new PipelineConfigError(
          `Unknown placeholder '{${name}}' in pipeline_command`
        );
      }

      result += paths[name];
      i = close + 1;
      continue;
    }

    if (char === '}') {
      if (template[i + 1] === '}') {
        result += '}';
        i += 2;
        continue;
      }
      throw new PipelineConfigError(
        `Single '}' at position ${i} in pipeline_command`
      );
    }

    result += char;
    i++;
  }

  return result;
}

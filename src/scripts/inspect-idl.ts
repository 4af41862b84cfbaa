import { readFile } from 'node:fs/promises';
import { config } from '../config';
import { ContractModel } from '../contract/model';
import { logger } from '../logging/logger';

async function main() {
  const idlPath = process.argv[2] ?? config.idl.path;
  const model = ContractModel.parse(await readFile(idlPath));
  model.validate();

  const structs = model.structNames().map((name) => {
    const struct = model.lookupStruct(name);
    return {
      name,
      extends: struct?.extends,
      fields: struct ? [...struct.resolvedFields.keys()] : [],
    };
  });
  const enums = model.enumNames().map((name) => ({
    name,
    values: model.lookupEnum(name)?.values.map((entry) => entry.value) ?? [],
  }));

  logger.info(
    {
      idlPath,
      meta: model.meta,
      methods: model.methodNames(),
      structs,
      enums,
    },
    'IDL summary',
  );
}

main().catch((error) => {
  logger.error({ err: error }, 'Failed to inspect IDL');
  process.exit(1);
});

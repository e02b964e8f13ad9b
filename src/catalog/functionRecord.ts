import { MalformedRecordError } from '../errors.js';
import type { DescriptorFields, FunctionRecord } from './catalogTypes.js';

export function recordName(fields: DescriptorFields): string {
  const name = fields.function;
  if (name === undefined || name === '') {
    throw new MalformedRecordError('catalog record has no "function" key', {
      keys: Object.keys(fields),
    });
  }
  return name;
}

export function toFunctionRecord(fields: DescriptorFields): FunctionRecord {
  const name = recordName(fields);
  const cname = fields.cname;
  if (cname === undefined || cname === '') {
    throw new MalformedRecordError(
      `catalog record for ${name} has no "cname" key`,
      { function: name },
    );
  }

  const record: FunctionRecord = {
    function: name,
    cname,
    prototype: fields.prototype ?? '',
    help: fields.help ?? '',
    class: fields.class ?? 'unknown',
    section: fields.section ?? 'unknown',
  };
  if (fields.doc !== undefined) record.doc = fields.doc;
  if (fields.obsolete !== undefined && fields.obsolete !== '') {
    record.obsolete = fields.obsolete;
  }
  return record;
}

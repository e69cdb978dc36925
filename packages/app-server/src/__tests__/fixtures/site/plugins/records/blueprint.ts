import { Blueprint } from '../../../../../blueprint.js';

export function createRecordsBlueprint(): Blueprint {
  return new Blueprint('records', { urlPrefix: '/records' })
    .get('/', 'list', (_req, res) => {
      res.json({ records: [] });
    })
    .get('/:id', 'detail', (req, res) => {
      res.json({ id: req.params.id });
    });
}

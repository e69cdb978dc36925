import { Blueprint, appServerOf } from '@crossurls/app-server';
import { urlFor } from '../../../../../urlFor.js';

export const help = new Blueprint('help').get('/help', 'index', (_req, res) => {
  res.send('main help');
});

export function createRecordsBlueprint(): Blueprint {
  return new Blueprint('records', { urlPrefix: '/records' })
    .get('/:id', 'detail', (req, res) => {
      const server = appServerOf(req);
      res.json({
        self: urlFor(server, 'records.detail', { id: req.params.id }),
        search: urlFor(server, 'search.results', { q: req.params.id }),
      });
    })
    .post('/', 'create', (_req, res) => {
      res.status(201).end();
    });
}

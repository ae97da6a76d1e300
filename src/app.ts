import { PORT } from 'App/config/config';
import server from './server';

export const main = async () => {
  const port = PORT || 3000;
  try {
    server.listen(port, () => {
      console.log(`Now listening on port ${port}`);
    });
  } catch (err) {
    console.error(err);
  }
};

if (require.main === module) {
  void main();
}

import type React from 'react';
import { Pencil } from '@strapi/icons';

/**
 * The part of Strapi's admin app API used here.
 */
interface AdminApp {
  addMenuLink(link: {
    to: string;
    icon: React.ComponentType;
    intlLabel: { id: string; defaultMessage: string };
    Component: () => Promise<React.ComponentType>;
    position?: number;
    permissions: unknown[];
  }): void;
}

export default {
  config: {
    locales: [],
  },
  register(app: AdminApp) {
    app.addMenuLink({
      to: 'plugins/article-writer',
      icon: Pencil,
      intlLabel: {
        id: 'article-writer.plugin.name',
        defaultMessage: 'Article Writer',
      },
      Component: async () => {
        const component = await import('./pages/ArticleWriter');
        return component.default;
      },
      position: 5,
      permissions: [],
    });
  },
  bootstrap() {},
};
